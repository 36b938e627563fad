/**
 * codeorbit — live radial map of a source tree
 *
 * App entry point: owns the diagram runtime, drives its frame loop and
 * feeds it the folder or files picked in the toolbar.
 */
import { useCallback, useEffect, useState } from 'react';
import Canvas from './components/Canvas';
import Toolbar from './components/Toolbar';
import { overridesFromEnv, resolveConfig } from './config/config';
import { DiagramRuntime } from './runtime/diagramRuntime';
import { OpenAIExplanationProvider } from './explain/openaiProvider';
import { MemoryFileSystem } from './ingest/memoryFileSystem';
import { useAnimationFrame } from './hooks/useAnimationFrame';
import { createLogger } from './lib/logger';
import { toErrorMessage } from './lib/errors';
import './App.css';

const logger = createLogger('app');

function createRuntime(): DiagramRuntime {
  const config = resolveConfig(overridesFromEnv(import.meta.env));
  return new DiagramRuntime({
    config,
    explanationProvider: new OpenAIExplanationProvider(config.explanation),
  });
}

export default function App() {
  const [runtime] = useState(createRuntime);

  useAnimationFrame(useCallback((dt: number) => runtime.tick(dt), [runtime]));

  // Stop background scans and streams on unmount. Unlike dispose() this is
  // restartable, so StrictMode's second mount still works.
  useEffect(() => {
    return () => {
      Promise.all([runtime.stopWatching(), runtime.stopExplanation()]).catch((err: unknown) => {
        logger.error('Shutdown failed', { error: toErrorMessage(err) });
      });
    };
  }, [runtime]);

  const handleOpenFolder = useCallback(
    (files: FileList) => {
      const fs = MemoryFileSystem.fromPickedFiles(Array.from(files));
      const [root] = fs.roots();
      if (!root) {
        logger.warn('Picked folder contains no directory', { files: files.length });
        return;
      }
      runtime.watch(fs, root).catch((err: unknown) => {
        logger.error(`Could not open ${root}`, { error: toErrorMessage(err) });
      });
    },
    [runtime],
  );

  const handleOpenFiles = useCallback(
    (files: FileList) => {
      const picked = Array.from(files);
      const fs = MemoryFileSystem.fromPickedFiles(picked);
      const paths = picked.map((file) => file.webkitRelativePath || file.name);
      runtime.loadFiles(fs, paths).catch((err: unknown) => {
        logger.error('Could not open files', { error: toErrorMessage(err), files: paths.length });
      });
    },
    [runtime],
  );

  return (
    <div className="app-container">
      <Toolbar runtime={runtime} onOpenFolder={handleOpenFolder} onOpenFiles={handleOpenFiles} />
      <div className="canvas-container">
        <Canvas runtime={runtime} />
      </div>
    </div>
  );
}
