/**
 * Attacking type → defending type → damage multiplier.
 */

export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class TypeChart {
  private readonly rows = new Map<number, Map<number, number>>();

  /**
   * Set the row for one attacking type. Defending types are numbered from 1
   * in the order of `multipliers`.
   */
  setRow(attackingType: number, multipliers: readonly number[]): void {
    const row = new Map<number, number>();
    multipliers.forEach((multiplier, index) => row.set(index + 1, multiplier));
    this.rows.set(attackingType, row);
  }

  has(typeId: number): boolean {
    return this.rows.has(typeId);
  }

  /** Attacking type ids, ascending. */
  typeIds(): number[] {
    return [...this.rows.keys()].sort((a, b) => a - b);
  }

  row(attackingType: number): ReadonlyMap<number, number> | undefined {
    return this.rows.get(attackingType);
  }

  effectiveness(attackingType: number, defendingType: number): number {
    const multiplier = this.rows.get(attackingType)?.get(defendingType);
    if (multiplier === undefined) {
      throw new DataIntegrityError(
        `Type chart has no entry for type ${attackingType} against type ${defendingType}`,
      );
    }
    return multiplier;
  }

  /**
   * Multiplier against a defending type pair. A pair of equal types counts once.
   */
  pairEffectiveness(attackingType: number, first: number, second: number): number {
    if (first === second) {
      return this.effectiveness(attackingType, first);
    }
    return this.effectiveness(attackingType, first) * this.effectiveness(attackingType, second);
  }

  get size(): number {
    return this.rows.size;
  }
}
