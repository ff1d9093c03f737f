/**
 * Triangular numbers delimit the rows of the board: row r holds the
 * positions (T(r-1), T(r)] where T(0) = 0.
 */

/**
 * Lazily generate the triangular numbers 1, 3, 6, 10, 15, ...
 * Every call starts a fresh sequence.
 */
export function * triangular (): Generator<number, never> {
  let sum = 0
  for (let n = 1; ; n++) {
    sum += n
    yield sum
  }
}

/**
 * Closed form of the k-th triangular number
 */
export function triangularNumber (k: number): number {
  return k * (k + 1) / 2
}

export function isTriangular (n: number): boolean {
  // T(0) is not produced by the sequence but closes the (empty) row 0
  let last = 0
  for (const t of triangular()) {
    if (t > n) {
      break
    }
    last = t
  }
  return last === n
}

/**
 * Triangular number at the end of row `row`. Row 0 closes at 0
 */
export function rowTriangular (row: number): number {
  let last = 0
  let taken = 0
  for (const t of triangular()) {
    if (taken >= row) {
      break
    }
    last = t
    taken++
  }
  return last
}

/**
 * Row number (1-based) holding position `pos`: p1 is on row 1, p2 and p3 on row 2
 */
export function rowOf (pos: number): number {
  let below = 0
  for (const t of triangular()) {
    if (t >= pos) {
      break
    }
    below++
  }
  return below + 1
}

/**
 * All positions of row `row` in ascending order
 */
export function rowPositions (row: number): number[] {
  const first = rowTriangular(row - 1) + 1
  const last = rowTriangular(row)
  const positions: number[] = []
  for (let pos = first; pos <= last; pos++) {
    positions.push(pos)
  }
  return positions
}
