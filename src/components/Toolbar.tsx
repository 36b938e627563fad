/**
 * Toolbar — top bar with folder and file picking, view actions and explanation
 * controls for the selected file.
 */
import { useEffect, useRef } from 'react';
import { useStore } from 'zustand';
import type { DiagramRuntime } from '../runtime/diagramRuntime';
import { createLogger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import './Toolbar.css';

const logger = createLogger('toolbar');

interface ToolbarProps {
    runtime: DiagramRuntime;
    onOpenFolder: (files: FileList) => void;
    onOpenFiles: (files: FileList) => void;
}

function reportFailure(action: string) {
    return (err: unknown) => logger.error(`${action} failed`, { error: toErrorMessage(err) });
}

export default function Toolbar({ runtime, onOpenFolder, onOpenFiles }: ToolbarProps) {
    const folderInputRef = useRef<HTMLInputElement | null>(null);
    const filesInputRef = useRef<HTMLInputElement | null>(null);
    const scale = useStore(runtime.store, (s) => s.view.scale);
    const nodes = useStore(runtime.store, (s) => s.nodes);
    const selectedNodeId = useStore(runtime.store, (s) => s.selectedNodeId);

    const selectedNode = selectedNodeId !== null ? (nodes[selectedNodeId] ?? null) : null;
    const selectedDetail = selectedNode?.kind === 'detail' ? selectedNode : null;
    const fileCount = nodes.filter((node) => node.kind === 'detail').length;

    // React has no typed prop for directory selection.
    useEffect(() => {
        folderInputRef.current?.setAttribute('webkitdirectory', '');
    }, []);

    return (
        <div className="toolbar">
            <div className="toolbar-brand">
                <span className="toolbar-logo">🪐</span>
                <span className="toolbar-title">codeorbit</span>
            </div>

            <button className="toolbar-btn" onClick={() => folderInputRef.current?.click()} title="Open folder">
                📂 Open folder
            </button>
            <input
                ref={folderInputRef}
                type="file"
                multiple
                hidden
                onChange={(e) => {
                    if (e.target.files && e.target.files.length > 0) onOpenFolder(e.target.files);
                    e.target.value = '';
                }}
            />
            <button className="toolbar-btn" onClick={() => filesInputRef.current?.click()} title="Open files">
                📄 Open files
            </button>
            <input
                ref={filesInputRef}
                type="file"
                multiple
                hidden
                onChange={(e) => {
                    if (e.target.files && e.target.files.length > 0) onOpenFiles(e.target.files);
                    e.target.value = '';
                }}
            />

            <div className="toolbar-divider" />

            <div className="toolbar-zoom">
                <button className="toolbar-btn" onClick={() => runtime.zoomOut()} title="Zoom out">
                    −
                </button>
                <span className="toolbar-zoom-level">{Math.round(scale * 100)}%</span>
                <button className="toolbar-btn" onClick={() => runtime.zoomIn()} title="Zoom in">
                    +
                </button>
                <button className="toolbar-btn" onClick={() => runtime.fitToContent()} title="Fit diagram">
                    ⤢ Fit
                </button>
            </div>

            <div className="toolbar-divider" />

            {selectedDetail && (
                <div className="toolbar-node-actions">
                    <span className="toolbar-node-label">{selectedDetail.label}</span>
                    {selectedDetail.explanation.status === 'running' ? (
                        <button
                            className="toolbar-btn toolbar-btn-danger"
                            onClick={() => {
                                runtime.stopExplanation(selectedDetail.id).catch(reportFailure('Stop'));
                            }}
                        >
                            ■ Stop
                        </button>
                    ) : (
                        <button className="toolbar-btn" onClick={() => runtime.explain(selectedDetail.id)}>
                            ✨ Explain
                        </button>
                    )}
                    {selectedDetail.explanation.text.length > 0 && (
                        <button className="toolbar-btn" onClick={() => runtime.toggleExplanationView(selectedDetail.id)}>
                            {selectedDetail.explanation.showing ? '📄 Contents' : '💬 Explanation'}
                        </button>
                    )}
                </div>
            )}

            {!selectedDetail && (
                <div className="toolbar-hint">
                    {fileCount} files · click a file to expand it, <kbd>Ctrl</kbd>+<kbd>Shift</kbd>+<kbd>E</kbd> explains
                    the next one
                </div>
            )}

            <div className="toolbar-shortcuts">
                <kbd>+</kbd>/<kbd>-</kbd> zoom
                <kbd>F</kbd> fit
                <kbd>Space</kbd> expand
                <kbd>Esc</kbd> stop
            </div>
        </div>
    );
}
