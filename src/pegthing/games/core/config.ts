export class Config {
  // ---------------------------------
  // Board configuration

  // Number of rows offered when the player just presses enter
  public rows: number = 5

  // ---------------------------------
  // Prompt defaults

  // Letter of the hole emptied when the player just presses enter
  public emptyHole: string = 'e'
  // Answer assumed for the replay question when the player just presses enter
  public playAgain: string = 'y'

  /**
   * Construct the configuration object
   * @param maxRows Largest number of rows a board may have. Bounded by the
   * number of positions the input alphabet can address
   */
  constructor (
    public readonly maxRows: number
  ) {
    this.rows = Math.min(this.rows, this.maxRows)
  }
}
