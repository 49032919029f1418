/**
 * Buffer Coordinates
 *
 * Positions are zero-based (line, column) pairs. A column may equal the
 * line's length, meaning "after the last character".
 */

// ============================================
// Types
// ============================================

export interface Position {
  line: number;
  column: number;
}

// ============================================
// Utility Functions
// ============================================

/**
 * Check if two positions are equal.
 */
export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

/**
 * Format a position for display, 1-based line like the status bar.
 */
export function formatPosition(position: Position): string {
  return `(${position.line + 1}, ${position.column})`;
}
