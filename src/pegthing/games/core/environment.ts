import { type Action } from './action'
import { type Config } from './config'
import { type State } from './state'

/**
 * Environment - the game a player is interacting with
 *
 * The environment defines a set of methods to interact with the implemented game
 *   - configuration parameters
 *   - reset of the game
 *   - applying an action to the game
 *   - score and end-state of the last action applied
 *   - rendering
 */
export interface Environment<S extends State, A extends Action> {
  config (): Config

  reset (): S

  /*
  `step` takes in a `State` and an `Action` as arguments. It applies the
  `Action` to the `State` and returns a new `State`.

  **IMPORTANT**
  Make sure that the function indeed returns a NEW State and does not simply
  mutate the provided State.
   */
  step (state: S, action: A): S

  /*
  `legalActions` takes in a `State` as an argument and returns an `Array` of
  possible `Action`s.
  */
  legalActions (state: S): A[]

  /*
  `terminal` takes in a `State` as an argument and returns `true` if the game
  is over and `false` otherwise.
   */
  terminal (state: S): boolean

  /*
  `score` takes in a `State` and returns the current outcome of the game as a
  `number`. Lower is better for solitaire games.
   */
  score (state: S): number

  toString (state: S): string
}
