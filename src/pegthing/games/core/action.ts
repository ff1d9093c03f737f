/**
 * `Action` is the interface every move handed to an [[Environment]] implements.
 * The shape of the move is left up to the game, but it should at least carry
 * a numeric `id` that is unique within the game's action space.
 */
export interface Action {
  id: number
  toString: () => string
}
