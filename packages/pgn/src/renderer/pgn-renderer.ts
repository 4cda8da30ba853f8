/**
 * Default maximum line length for PGN output
 */
export const DEFAULT_MAX_LINE_LENGTH = 80;

/**
 * A single PGN tag pair
 */
export interface PgnTag {
  name: string;
  value: string;
}

/**
 * A move of the main line
 */
export interface PgnMove {
  moveNumber: number;
  san: string;
  isWhiteMove: boolean;
}

/**
 * A game ready to be written out
 */
export interface PgnGame {
  /** Tags in output order */
  tags: PgnTag[];
  moves: PgnMove[];
  /** Game termination marker, e.g. "*" */
  result: string;
}

/**
 * Options for PGN rendering
 */
export interface RenderOptions {
  /**
   * Maximum line length for move text (default: 80)
   * Set to 0 to disable line wrapping
   */
  maxLineLength?: number;
}

/**
 * Render a game to PGN string format
 *
 * @returns Tag section, a blank line, then the move text (no trailing newline)
 */
export function renderPgnString(game: PgnGame, options?: RenderOptions): string {
  const parts: string[] = [];

  parts.push(game.tags.map((tag) => renderTag(tag.name, tag.value)).join('\n'));
  parts.push('');

  const moveText = renderMoves(game.moves, game.result);

  const maxLineLength = options?.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  if (maxLineLength > 0) {
    parts.push(wrapMoveText(moveText, maxLineLength));
  } else {
    parts.push(moveText);
  }

  return parts.join('\n');
}

/**
 * Render a single PGN tag
 */
export function renderTag(name: string, value: string): string {
  // Escape backslashes and quotes in the value
  const escapedValue = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${name} "${escapedValue}"]`;
}

/**
 * Render the move text section
 *
 * White moves carry their number; a black move opening the text is written
 * as "N...".
 */
export function renderMoves(moves: readonly PgnMove[], result: string): string {
  const parts: string[] = [];

  moves.forEach((move, index) => {
    if (move.isWhiteMove) {
      parts.push(`${move.moveNumber}.`);
    } else if (index === 0) {
      parts.push(`${move.moveNumber}...`);
    }
    parts.push(move.san);
  });

  parts.push(result);

  return parts.join(' ');
}

/**
 * Wrap move text to respect maximum line length
 *
 * Breaks only at spaces. A token longer than the limit gets a line of its
 * own.
 *
 * @param text - The move text to wrap
 * @param maxLength - Maximum line length
 * @returns Wrapped text with newlines
 */
export function wrapMoveText(text: string, maxLength: number): string {
  if (!text || maxLength <= 0) {
    return text;
  }

  const tokens = text.split(' ').filter((token) => token.length > 0);
  const lines: string[] = [];
  let currentLine = '';

  for (const token of tokens) {
    const wouldExceed = currentLine.length > 0 && currentLine.length + 1 + token.length > maxLength;

    if (wouldExceed) {
      lines.push(currentLine);
      currentLine = token;
    } else if (currentLine.length > 0) {
      currentLine += ' ' + token;
    } else {
      currentLine = token;
    }
  }

  if (currentLine.length > 0) {
    lines.push(currentLine);
  }

  return lines.join('\n');
}
