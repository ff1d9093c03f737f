import { type PegBoard } from './pegboard'
import { OutOfRangeError } from './pegerrors'
import { rowPositions } from './triangular'

const alphaStart = 'a'.charCodeAt(0)

// Every position is addressed by a single letter: a is 1, b is 2, ...
export const LETTERS: readonly string[] = new Array<number>(26).fill(0).map(
  (_, index) => String.fromCharCode(alphaStart + index)
)

// Width of a rendered position, used to center the rows
const posChars = 3

/**
 * Converts a letter to the corresponding position
 */
export function letterToPos (letter: string): number {
  return letter.charCodeAt(0) - alphaStart + 1
}

export function posToLetter (pos: number): string {
  const letter = LETTERS[pos - 1]
  if (letter === undefined) {
    throw new OutOfRangeError(pos, LETTERS.length)
  }
  return letter
}

/**
 * The letters of `input` in order, anything else dropped
 */
export function lettersOf (input: string): string[] {
  return [...input].filter(c => /^[a-z]$/i.test(c))
}

export function renderPos (board: PegBoard, pos: number): string {
  return `${posToLetter(pos)}${board.isPegged(pos) ? '0' : '-'}`
}

/**
 * String of spaces to put in front of a row to center it
 */
export function rowPadding (row: number, rows: number): string {
  return ' '.repeat(Math.max(0, Math.ceil((rows - row) * posChars / 2)))
}

export function renderRow (board: PegBoard, row: number): string {
  return rowPadding(row, board.rows) + rowPositions(row).map(pos => renderPos(board, pos)).join(' ')
}

export function renderBoard (board: PegBoard): string[] {
  const lines: string[] = []
  for (let row = 1; row <= board.rows; row++) {
    lines.push(renderRow(board, row))
  }
  return lines
}
