// SPDX-License-Identifier: Apache-2.0

import {Version} from './version.js';

/**
 * A range of versions which includes the beginning version and excludes the end version.
 */
export class VersionRange {
  public constructor(
    /**
     * The beginning of the version range (inclusive).
     */
    public readonly begin: Version,
    /**
     * The end of the version range (exclusive).
     */
    public readonly end: Version,
  ) {
    if (this.begin.compare(this.end) >= 0) {
      throw new RangeError('Invalid version range');
    }
  }

  /**
   * Creates a version range from the given integer bounds.
   *
   * @param begin - the beginning of the version range (inclusive).
   * @param end - the end of the version range (exclusive).
   * @throws RangeError if the bounds are invalid.
   */
  public static fromIntegerBounds(begin: number, end: number): VersionRange {
    return new VersionRange(new Version(begin), new Version(end));
  }

  /**
   * Creates a version range which contains only the given integer version.
   *
   * @throws RangeError if the version is invalid.
   */
  public static fromIntegerVersion(version: number): VersionRange {
    return new VersionRange(new Version(version), new Version(version + 1));
  }

  public equals(other: VersionRange): boolean {
    return this.begin.equals(other.begin) && this.end.equals(other.end);
  }

  public contains(version: Version): boolean {
    return this.begin.compare(version) <= 0 && this.end.compare(version) > 0;
  }

  public toString(): string {
    return `[${this.begin}, ${this.end})`;
  }
}
