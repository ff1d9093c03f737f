/**
 * A position was queried that has no hole on the board
 */
export class OutOfRangeError extends RangeError {
  constructor (
    public readonly position: number,
    maxPos: number
  ) {
    super(`Position ${position} is outside the board (1-${maxPos})`)
    this.name = 'OutOfRangeError'
  }
}

/**
 * The requested jump is not legal for the current board
 */
export class InvalidMoveError extends Error {
  constructor (
    public readonly from: number,
    public readonly to: number
  ) {
    super(`Invalid move from ${from} to ${to}`)
    this.name = 'InvalidMoveError'
  }
}
