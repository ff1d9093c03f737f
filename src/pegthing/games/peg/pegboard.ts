import debugFactory from 'debug'
import { isTriangular, rowOf, rowTriangular } from './triangular'
import { InvalidMoveError, OutOfRangeError } from './pegerrors'

const debug = debugFactory('pegthing:board:module')

/**
 * Jump connections of a single position: landing destination -> jumped position
 */
export type Connections = ReadonlyMap<number, number>

/**
 * Triangular peg board
 *
 * Positions are numbered row by row starting with 1 at the top. The connection
 * graph is fixed when the board is built and is shared by every board derived
 * from it; only the pegs change during play. All updates return a new board.
 */
export class PegBoard {
  /**
   * @param rows Number of rows the board was built with
   * @param links Connections by position, slot 0 unused
   * @param pegs Occupancy by position, slot 0 unused
   */
  constructor (
    public readonly rows: number,
    private readonly links: readonly Connections[],
    private readonly pegs: readonly boolean[]
  ) {
    if (links.length !== pegs.length) {
      throw new Error(`Board shape mismatch: ${links.length} connection slots for ${pegs.length} holes`)
    }
  }

  /**
   * Highest position on the board, 0 for a board without rows
   */
  get maxPos (): number {
    return this.pegs.length - 1
  }

  /**
   * All positions in ascending order
   */
  get positions (): number[] {
    return this.pegs.map((_, pos) => pos).slice(1)
  }

  /**
   * Number of pegs left on the board
   */
  get pegCount (): number {
    return this.pegs.reduce((count, pegged) => pegged ? count + 1 : count, 0)
  }

  public isPegged (pos: number): boolean {
    return this.pegs[this.checkPos(pos)]
  }

  public removePeg (pos: number): PegBoard {
    return this.withPeg(pos, false)
  }

  public placePeg (pos: number): PegBoard {
    return this.withPeg(pos, true)
  }

  public connections (pos: number): Connections {
    return this.links[this.checkPos(pos)]
  }

  /**
   * Legal jumps from `pos` as destination -> jumped position.
   * A jump needs an empty destination and a pegged position to jump over
   */
  public validMoves (pos: number): Map<number, number> {
    const moves = new Map<number, number>()
    if (!this.isPegged(pos)) {
      return moves
    }
    for (const [destination, jumped] of this.connections(pos)) {
      if (!this.isPegged(destination) && this.isPegged(jumped)) {
        moves.set(destination, jumped)
      }
    }
    return moves
  }

  /**
   * The position jumped when moving from `p1` to `p2`, or undefined if
   * that is not a legal move
   */
  public validMove (p1: number, p2: number): number | undefined {
    return this.validMoves(p1).get(p2)
  }

  /**
   * True while any pegged position anywhere on the board can jump
   */
  public anyMoveExists (): boolean {
    return this.positions.some(pos => this.isPegged(pos) && this.validMoves(pos).size > 0)
  }

  /**
   * Jump from `p1` to `p2`, removing the jumped peg
   * @throws InvalidMoveError if the jump is not legal. The board is left as is
   */
  public makeMove (p1: number, p2: number): PegBoard {
    const jumped = this.validMove(p1, p2)
    if (jumped === undefined) {
      debug(`Rejected move ${p1} -> ${p2}`)
      throw new InvalidMoveError(p1, p2)
    }
    const pegs = [...this.pegs]
    pegs[jumped] = false
    pegs[p1] = false
    pegs[p2] = true
    debug(`Moved ${p1} -> ${p2} over ${jumped}`)
    return new PegBoard(this.rows, this.links, pegs)
  }

  private withPeg (pos: number, pegged: boolean): PegBoard {
    const pegs = [...this.pegs]
    pegs[this.checkPos(pos)] = pegged
    return new PegBoard(this.rows, this.links, pegs)
  }

  private checkPos (pos: number): number {
    if (!Number.isInteger(pos) || pos < 1 || pos > this.maxPos) {
      throw new OutOfRangeError(pos, this.maxPos)
    }
    return pos
  }
}

/**
 * Creates a fully pegged board with a given number of rows.
 * A board of 0 rows has no holes and cannot be played
 */
export function newBoard (rows: number): PegBoard {
  if (!Number.isInteger(rows) || rows < 0) {
    throw new RangeError(`Row count must be a non-negative integer, got ${rows}`)
  }
  const maxPos = rowTriangular(rows)
  const links: Array<Map<number, number>> = []
  for (let pos = 0; pos <= maxPos; pos++) {
    links.push(new Map<number, number>())
  }
  // Record a jump in both directions, unless it would land off the board
  const connect = (pos: number, neighbor: number, destination: number): void => {
    if (destination <= maxPos) {
      links[pos].set(destination, neighbor)
      links[destination].set(pos, neighbor)
    }
  }
  for (let pos = 1; pos <= maxPos; pos++) {
    // A triangular position closes its row, so jumping right would wrap
    if (!isTriangular(pos) && !isTriangular(pos + 1)) {
      connect(pos, pos + 1, pos + 2)
    }
    const row = rowOf(pos)
    const downLeft = pos + row
    connect(pos, downLeft, 1 + row + downLeft)
    const downRight = pos + row + 1
    connect(pos, downRight, 2 + row + downRight)
  }
  const pegs = new Array<boolean>(maxPos + 1).fill(true)
  pegs[0] = false
  if (debug.enabled) {
    const total = links.reduce((s, l) => s + l.size, 0)
    debug(`Built board of ${rows} rows: ${maxPos} holes, ${total / 2} jumps`)
  }
  return new PegBoard(rows, links, pegs)
}
