// SPDX-License-Identifier: Apache-2.0

/**
 * The ObjectMapper interface defines the methods for converting class instances into plain javascript objects.
 *
 * This is an abstraction that allows the data layer to be decoupled from the underlying object mapper implementation.
 */
export interface ObjectMapper {
  /**
   * Converts an instance of a class into a plain javascript object.
   *
   * @param data - The object instance to be converted.
   * @throws ObjectMappingError if the mapping or a type conversion fails.
   */
  toObject<T extends object>(data: T): Record<string, unknown>;
}
