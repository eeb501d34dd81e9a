/**
 * Raw bytes ⇄ structured values for one family of media types.
 */
export interface Codec {
  /** `json`, `msgpack` */
  readonly name: string;
  /** Media types this codec handles; the first one is sent as `Content-Type`. */
  readonly mediaTypes: readonly string[];
  /** @throws when `raw` is not valid for this codec. */
  decode(raw: Uint8Array | string): unknown;
  encode(value: unknown): Uint8Array;
}
