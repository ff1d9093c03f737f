import { type State } from '../core/state'
import { type PegAction } from './pegaction'
import { type PegBoard } from './pegboard'

export class PegState implements State {
  constructor (
    public readonly board: PegBoard,
    public readonly history: PegAction[]
  ) {
  }

  public toString (): string {
    const actionHistory = this.history.length > 0 ? this.history.map(a => a.toString()).join(':') : '*'
    return `${actionHistory} | ${this.board.pegCount}`
  }
}
