import readline from 'readline'
import debugFactory from 'debug'
import { type Config } from '../core/config'
import { type PegThing } from './peg'
import { type PegState } from './pegstate'
import { PegAction } from './pegaction'
import { InvalidMoveError, OutOfRangeError } from './pegerrors'
import { letterToPos, lettersOf, posToLetter, renderBoard } from './pegutil'

const debug = debugFactory('pegthing:app:round')

/**
 * Source of the player's answers, one line per call.
 * `read` resolves to undefined once the input is exhausted
 */
export interface Prompter {
  read: () => Promise<string | undefined>
  close: () => void
}

export type Writer = (line: string) => void

type RoundPhase = 'AwaitingEmptyHoleChoice' | 'Playing' | 'GameOver'

class InputClosedError extends Error {
  constructor () {
    super('Input closed')
    this.name = 'InputClosedError'
  }
}

/**
 * Read answers line by line from a stream, stdin by default
 */
export function streamPrompter (input: NodeJS.ReadableStream = process.stdin): Prompter {
  const rl = readline.createInterface({ input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()
  return {
    read: async () => {
      const line = await lines.next()
      return line.done === true ? undefined : line.value
    },
    close: () => {
      rl.close()
    }
  }
}

/**
 * Interactive Peg Thing rounds: pick the board, empty a hole, jump until
 * no move is left, then offer another round
 */
export class PegApp {
  constructor (
    private readonly factory: PegThing,
    private readonly conf: Config,
    private readonly prompter: Prompter,
    private readonly write: Writer = line => { console.log(line) }
  ) {
  }

  /**
   * Play rounds until the player declines another one or the input ends
   * @returns The score of every finished round
   */
  public async run (): Promise<number[]> {
    const scores: number[] = []
    try {
      let again = true
      while (again) {
        const state = await this.playRound()
        const score = this.factory.score(state)
        scores.push(score)
        debug(`Round ${scores.length} finished with ${score} pegs: ${state.toString()}`)
        again = await this.gameOver(state)
      }
    } catch (e) {
      if (!(e instanceof InputClosedError)) {
        throw e
      }
      debug('Input closed, leaving')
    } finally {
      this.prompter.close()
    }
    this.write('Bye!')
    return scores
  }

  private async playRound (): Promise<PegState> {
    const rows = await this.promptRows()
    let state = this.factory.reset(rows)
    let phase: RoundPhase = 'AwaitingEmptyHoleChoice'
    while (phase !== 'GameOver') {
      if (phase === 'AwaitingEmptyHoleChoice') {
        state = await this.promptEmptyPeg(state)
      } else {
        state = await this.promptMove(state)
      }
      phase = this.factory.terminal(state) ? 'GameOver' : 'Playing'
    }
    return state
  }

  private async promptRows (): Promise<number> {
    for (;;) {
      const input = await this.getInput(`How many rows? [${this.conf.rows}]`, String(this.conf.rows))
      const rows = Number(input)
      if (Number.isInteger(rows) && rows >= 1 && rows <= this.conf.maxRows) {
        return rows
      }
      this.write(`Please enter a number of rows from 1 to ${this.conf.maxRows}.`)
    }
  }

  private async promptEmptyPeg (state: PegState): Promise<PegState> {
    this.write('Here\'s your board:')
    this.printBoard(state)
    for (;;) {
      const input = await this.getInput(`Remove which peg? [${this.conf.emptyHole}]`, this.conf.emptyHole)
      const [letter] = lettersOf(input)
      if (letter !== undefined) {
        try {
          return this.factory.removePeg(state, letterToPos(letter))
        } catch (e) {
          if (!(e instanceof OutOfRangeError)) {
            throw e
          }
        }
      }
      this.write(`Please pick a letter from a to ${posToLetter(state.board.maxPos)}.`)
    }
  }

  /**
   * One move attempt. An invalid move leaves the state as it was
   */
  private async promptMove (state: PegState): Promise<PegState> {
    this.write('')
    this.write('Here\'s your board:')
    this.printBoard(state)
    const input = await this.getInput('Move from where to where? Enter two letters:')
    const action = PegAction.parse(input)
    if (action !== undefined) {
      try {
        return this.factory.step(state, action)
      } catch (e) {
        if (!(e instanceof InvalidMoveError || e instanceof OutOfRangeError)) {
          throw e
        }
        debug(e.message)
      }
    }
    this.write('')
    this.write('!!! That was an invalid move. :(')
    this.write('')
    return state
  }

  /**
   * Announce the result and ask for another round
   */
  private async gameOver (state: PegState): Promise<boolean> {
    this.write(`Game over! You had ${this.factory.score(state)} pegs left:`)
    this.printBoard(state)
    const input = await this.getInput('Play again? [y/n]', this.conf.playAgain)
    return input === 'y'
  }

  private printBoard (state: PegState): void {
    for (const line of renderBoard(state.board)) {
      this.write(line)
    }
  }

  /**
   * Ask a question and wait for a trimmed, lower-cased answer.
   * An empty answer takes the default
   */
  private async getInput (question: string, fallback = ''): Promise<string> {
    this.write(question)
    const line = await this.prompter.read()
    if (line === undefined) {
      throw new InputClosedError()
    }
    const input = line.trim()
    return input.length === 0 ? fallback : input.toLowerCase()
  }
}
