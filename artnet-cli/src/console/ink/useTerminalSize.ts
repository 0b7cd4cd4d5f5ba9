/**
 * Hook that returns terminal dimensions and re-renders on resize.
 */

import { useState, useEffect } from 'react';

export interface TerminalSize {
  columns: number;
  rows: number;
}

function readSize(): TerminalSize {
  return {
    columns: process.stdout.columns || 80,
    rows: process.stdout.rows || 24,
  };
}

/** Lines scrolled by PageUp/PageDown: the screen minus toolbar, input and margins. */
export function pageSizeFor(rows: number): number {
  return Math.max(1, rows - 4);
}

export function useTerminalSize(): TerminalSize {
  const [size, setSize] = useState<TerminalSize>(readSize);

  useEffect(() => {
    const onResize = () => setSize(readSize());
    process.stdout.on('resize', onResize);
    return () => {
      process.stdout.off('resize', onResize);
    };
  }, []);

  return size;
}
