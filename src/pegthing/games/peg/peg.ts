import debugFactory from 'debug'
import { type Environment } from '../core/environment'
import { Config } from '../core/config'
import { PegState } from './pegstate'
import { PegAction } from './pegaction'
import { newBoard } from './pegboard'
import { LETTERS, renderBoard } from './pegutil'
import { triangularNumber } from './triangular'

const debug = debugFactory('pegthing:peg:module')

/**
 * Peg Thing - triangular peg solitaire
 *
 * One peg is removed from a full triangular board. Pegs then jump over an
 * adjacent peg into an empty hole, removing the jumped peg, until no jump is
 * left. The score is the number of pegs remaining, one being a perfect game.
 */
export class PegThing implements Environment<PegState, PegAction> {
  /**
   * config
   *  maxRows largest board whose positions all have a letter
   */
  config (): Config {
    let maxRows = 0
    while (triangularNumber(maxRows + 1) <= LETTERS.length) {
      maxRows++
    }
    return new Config(maxRows)
  }

  /**
   * A fully pegged board. The first hole is made with `removePeg`
   * @param rows Defaults to the configured row count
   */
  public reset (rows = this.config().rows): PegState {
    return new PegState(newBoard(rows), [])
  }

  public removePeg (state: PegState, pos: number): PegState {
    debug(`Emptied position ${pos} on ${state.board.rows} row board`)
    return new PegState(state.board.removePeg(pos), state.history)
  }

  /**
   * @throws InvalidMoveError when the jump is illegal on the state's board
   */
  public step (state: PegState, action: PegAction): PegState {
    const board = state.board.makeMove(action.from, action.to)
    return new PegState(board, state.history.concat([action]))
  }

  public legalActions (state: PegState): PegAction[] {
    const legal: PegAction[] = []
    for (const from of state.board.positions) {
      const destinations = [...state.board.validMoves(from).keys()].sort((a, b) => a - b)
      for (const to of destinations) {
        legal.push(new PegAction(from, to))
      }
    }
    return legal
  }

  public terminal (state: PegState): boolean {
    return !state.board.anyMoveExists()
  }

  /**
   * Pegs left on the board
   */
  public score (state: PegState): number {
    return state.board.pegCount
  }

  public toString (state: PegState): string {
    return renderBoard(state.board).join('\n')
  }
}
