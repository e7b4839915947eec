/**
 * Write side of the host engine. Each writer receives exactly one value.
 */
export interface JsonWriter {
  writeString(value: string): void
  writeNumber(value: number): void
  writeBoolean(value: boolean): void
  writeNull(): void

  /** Turns the current value into an object, which may stay without properties. */
  writeObject(): void

  /**
   * Turns the current value into an object and returns the writer for one of its
   * properties. Properties keep the order in which they were first requested.
   */
  writeProperty(name: string): JsonWriter
}
