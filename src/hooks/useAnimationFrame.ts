import { useEffect, useRef } from 'react';

/**
 * Call `onFrame(dt)` on every animation frame while mounted, `dt` being the
 * milliseconds since the previous frame (0 on the first one).
 */
export function useAnimationFrame(onFrame: (dt: number) => void): void {
    // Hold the callback in a ref so a new closure does not restart the loop.
    const onFrameRef = useRef(onFrame);
    useEffect(() => {
        onFrameRef.current = onFrame;
    }, [onFrame]);

    useEffect(() => {
        let handle = 0;
        let previous: number | null = null;

        function frame(now: number): void {
            const dt = previous === null ? 0 : now - previous;
            previous = now;
            onFrameRef.current(dt);
            handle = requestAnimationFrame(frame);
        }

        handle = requestAnimationFrame(frame);
        return () => cancelAnimationFrame(handle);
    }, []);
}
