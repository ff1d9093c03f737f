import { describe, expect, test } from '@jest/globals'
import { PegThing } from '../../pegthing/games/peg/peg'
import { PegApp, type Prompter } from '../../pegthing/games/peg/pegapp'

/**
 * Answers the prompts from a fixed script, then reports the input as closed
 */
class ScriptedPrompter implements Prompter {
  public closed = false

  constructor (private readonly answers: string[]) {
  }

  async read (): Promise<string | undefined> {
    return this.answers.shift()
  }

  close (): void {
    this.closed = true
  }
}

const play = async (answers: string[]): Promise<{ scores: number[], output: string[], prompter: ScriptedPrompter }> => {
  const factory = new PegThing()
  const output: string[] = []
  const prompter = new ScriptedPrompter(answers)
  const scores = await new PegApp(factory, factory.config(), prompter, line => { output.push(line) }).run()
  return { scores, output, prompter }
}

describe('Peg Thing Round Test:', () => {
  test('Play a round to the end', async () => {
    const { scores, output, prompter } = await play(['3', 'a', 'da', 'ab', 'fd', 'af', 'n'])
    expect(scores).toEqual([2])
    expect(prompter.closed).toBeTruthy()
    expect(output).toEqual([
      'How many rows? [5]',
      'Here\'s your board:',
      '   a0',
      '  b0 c0',
      'd0 e0 f0',
      'Remove which peg? [e]',
      '',
      'Here\'s your board:',
      '   a-',
      '  b0 c0',
      'd0 e0 f0',
      'Move from where to where? Enter two letters:',
      '',
      'Here\'s your board:',
      '   a0',
      '  b- c0',
      'd- e0 f0',
      'Move from where to where? Enter two letters:',
      '',
      '!!! That was an invalid move. :(',
      '',
      '',
      'Here\'s your board:',
      '   a0',
      '  b- c0',
      'd- e0 f0',
      'Move from where to where? Enter two letters:',
      '',
      'Here\'s your board:',
      '   a0',
      '  b- c0',
      'd0 e- f-',
      'Move from where to where? Enter two letters:',
      'Game over! You had 2 pegs left:',
      '   a-',
      '  b- c-',
      'd0 e- f0',
      'Play again? [y/n]',
      'Bye!'
    ])
  })
  test('Take the defaults until the input ends', async () => {
    const { scores, output, prompter } = await play(['', ''])
    expect(scores).toEqual([])
    expect(prompter.closed).toBeTruthy()
    expect(output).toEqual([
      'How many rows? [5]',
      'Here\'s your board:',
      '      a0',
      '     b0 c0',
      '   d0 e0 f0',
      '  g0 h0 i0 j0',
      'k0 l0 m0 n0 o0',
      'Remove which peg? [e]',
      '',
      'Here\'s your board:',
      '      a0',
      '     b0 c0',
      '   d0 e- f0',
      '  g0 h0 i0 j0',
      'k0 l0 m0 n0 o0',
      'Move from where to where? Enter two letters:',
      'Bye!'
    ])
  })
  test('Reprompt bad answers and play again', async () => {
    const { scores, output } = await play(['1', '', 'a', 'y', '7', 'x', '2', 'b', 'N'])
    expect(scores).toEqual([0, 2])
    expect(output).toEqual([
      'How many rows? [5]',
      'Here\'s your board:',
      'a0',
      'Remove which peg? [e]',
      'Please pick a letter from a to a.',
      'Remove which peg? [e]',
      'Game over! You had 0 pegs left:',
      'a-',
      'Play again? [y/n]',
      'How many rows? [5]',
      'Please enter a number of rows from 1 to 6.',
      'How many rows? [5]',
      'Please enter a number of rows from 1 to 6.',
      'How many rows? [5]',
      'Here\'s your board:',
      '  a0',
      'b0 c0',
      'Remove which peg? [e]',
      'Game over! You had 2 pegs left:',
      '  a0',
      'b- c0',
      'Play again? [y/n]',
      'Bye!'
    ])
  })
  test('Reject moves that cannot be read', async () => {
    const { scores, output } = await play(['3', 'a', 'z', 'zz', '??'])
    expect(scores).toEqual([])
    expect(output.filter(line => line === '!!! That was an invalid move. :(').length).toEqual(3)
    expect(output[output.length - 1]).toEqual('Bye!')
  })
})
