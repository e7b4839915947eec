export type NameTableEntry<M extends number = number> = Readonly<{
  name: string
  value: M
}>

/**
 * Bidirectional lookup between the member names and values of one enum.
 *
 * @remarks
 * Lookups are exact: no case folding, trimming or numeric fallback. Deciding what an
 * unmatched name means is left to the codec.
 */
export interface NameTable<M extends number = number> {
  readonly enumName: string

  /** Members in declaration order. */
  readonly members: readonly NameTableEntry<M>[]

  nameToValue(name: string): M | undefined

  /** Total over declared members; `undefined` only for values outside the enum. */
  valueToName(value: number): string | undefined
}
