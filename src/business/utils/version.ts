// SPDX-License-Identifier: Apache-2.0

export class Version {
  public constructor(public readonly value: number) {
    if (!Version.isValid(value)) {
      throw new RangeError('Invalid version');
    }
  }

  /**
   * Schema versions are non-negative safe integers.
   */
  public static isValid(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
  }

  public equals(other: Version): boolean {
    return this.value === other.value;
  }

  public compare(other: Version): number {
    if (this.value < other.value) {
      return -1;
    } else if (this.value > other.value) {
      return 1;
    }
    return 0;
  }

  public toString(): string {
    return this.value.toString();
  }
}
