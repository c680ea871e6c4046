import { InvalidArgumentError } from '../common/errors';

export interface EditCosts<T> {
  insert?: (destination: T) => number;
  delete?: (source: T) => number;
  substitute?: (source: T, destination: T) => number;
}

export type EditKind = 'match' | 'substitute' | 'delete' | 'insert';

export interface EditOperation<T> {
  kind: EditKind;
  source: T | null;
  destination: T | null;
  cost: number;
}

function checkedCost(value: number, operation: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${operation} cost`, `expected a finite non-negative number, got ${value}`);
  }
  return value;
}

/**
 * Dynamic-programming table for the cost of turning `source` into
 * `destination`. Rows follow the destination and columns the source, so the
 * table is `(destination.length + 1) x (source.length + 1)` and the distance is
 * the bottom-right cell.
 */
export class EditDistanceTable<T> {
  private constructor(
    readonly source: ArrayLike<T>,
    readonly destination: ArrayLike<T>,
    private readonly cells: number[][],
    private readonly costs: Required<EditCosts<T>>,
    private readonly equals: (a: T, b: T) => boolean,
  ) {}

  static compute<T>(
    source: ArrayLike<T>,
    destination: ArrayLike<T>,
    costs: EditCosts<T> = {},
    equals: (a: T, b: T) => boolean = Object.is,
  ): EditDistanceTable<T> {
    const resolved: Required<EditCosts<T>> = {
      insert: costs.insert ?? (() => 1),
      delete: costs.delete ?? (() => 1),
      substitute: costs.substitute ?? ((a, b) => (equals(a, b) ? 0 : 1)),
    };

    const rows = destination.length + 1;
    const columns = source.length + 1;
    const cells: number[][] = [];

    for (let row = 0; row < rows; row++) {
      cells.push(new Array<number>(columns).fill(0));
    }

    for (let column = 1; column < columns; column++) {
      cells[0][column] = cells[0][column - 1] + checkedCost(resolved.delete(source[column - 1]), 'delete');
    }
    for (let row = 1; row < rows; row++) {
      cells[row][0] = cells[row - 1][0] + checkedCost(resolved.insert(destination[row - 1]), 'insert');
    }

    for (let row = 1; row < rows; row++) {
      const target = destination[row - 1];
      for (let column = 1; column < columns; column++) {
        const from = source[column - 1];
        const substitute = cells[row - 1][column - 1] + checkedCost(resolved.substitute(from, target), 'substitute');
        const remove = cells[row][column - 1] + checkedCost(resolved.delete(from), 'delete');
        const insert = cells[row - 1][column] + checkedCost(resolved.insert(target), 'insert');
        cells[row][column] = Math.min(substitute, remove, insert);
      }
    }

    return new EditDistanceTable(source, destination, cells, resolved, equals);
  }

  get rows(): number {
    return this.cells.length;
  }

  get columns(): number {
    return this.cells[0].length;
  }

  get distance(): number {
    return this.cells[this.rows - 1][this.columns - 1];
  }

  get(row: number, column: number): number {
    if (row < 0 || row >= this.rows || column < 0 || column >= this.columns) {
      throw new InvalidArgumentError('cell', `(${row}, ${column}) is outside a ${this.rows}x${this.columns} table`);
    }
    return this.cells[row][column];
  }

  /**
   * One minimum-cost sequence of edits, in order from the start of both inputs.
   *
   * Walking back from the final cell, a predecessor qualifies when its cost
   * plus the cost of the connecting edit equals the current cell. Ties go to
   * substitution (or match), then deletion, then insertion. Throws
   * InvalidArgumentError when no predecessor qualifies.
   */
  alignment(): EditOperation<T>[] {
    const operations: EditOperation<T>[] = [];
    let row = this.rows - 1;
    let column = this.columns - 1;

    while (row > 0 || column > 0) {
      const here = this.cells[row][column];

      if (row > 0 && column > 0) {
        const from = this.source[column - 1];
        const target = this.destination[row - 1];
        const cost = this.costs.substitute(from, target);
        if (this.cells[row - 1][column - 1] + cost === here) {
          operations.push({
            kind: this.equals(from, target) ? 'match' : 'substitute',
            source: from,
            destination: target,
            cost,
          });
          row--;
          column--;
          continue;
        }
      }

      if (column > 0) {
        const from = this.source[column - 1];
        const cost = this.costs.delete(from);
        if (this.cells[row][column - 1] + cost === here) {
          operations.push({ kind: 'delete', source: from, destination: null, cost });
          column--;
          continue;
        }
      }

      if (row > 0) {
        const target = this.destination[row - 1];
        const cost = this.costs.insert(target);
        if (this.cells[row - 1][column] + cost === here) {
          operations.push({ kind: 'insert', source: null, destination: target, cost });
          row--;
          continue;
        }
      }

      throw new InvalidArgumentError(
        'costs',
        `no edit reaches cell (${row}, ${column}) at cost ${here}; cost functions must return the same value on every call`,
      );
    }

    return operations.reverse();
  }
}

export function editDistance<T>(
  source: ArrayLike<T>,
  destination: ArrayLike<T>,
  costs?: EditCosts<T>,
): number {
  return EditDistanceTable.compute(source, destination, costs).distance;
}
