import { type Action } from '../core/action'
import { LETTERS, letterToPos, lettersOf, posToLetter } from './pegutil'

/**
 * A jump from one position to another, written as two letters ("ad")
 */
export class PegAction implements Action {
  constructor (
    public readonly from: number,
    public readonly to: number
  ) {
  }

  /**
   * Unique id of the jump among all pairs the alphabet can address
   */
  get id (): number {
    return (this.from - 1) * LETTERS.length + (this.to - 1)
  }

  /**
   * Parse the first two letters of `input` into a jump
   * @returns undefined if the input holds fewer than two letters
   */
  public static parse (input: string): PegAction | undefined {
    const [from, to] = lettersOf(input.toLowerCase()).map(letterToPos)
    if (from === undefined || to === undefined) {
      return undefined
    }
    return new PegAction(from, to)
  }

  public toString (): string {
    return `${posToLetter(this.from)}${posToLetter(this.to)}`
  }
}
