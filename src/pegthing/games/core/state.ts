/**
 * `State` is the interface every game position handed to an [[Environment]]
 * implements. States are values: an environment never mutates a state it was
 * given, it returns a new one.
 */
export interface State {
  toString: () => string
}
