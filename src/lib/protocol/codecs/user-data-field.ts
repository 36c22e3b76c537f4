import type { UserDataField } from "../interfaces/user-data-field.ts";

/**
 * User data codec. The payload is carried as-is; both directions copy so a
 * decoded field never aliases the reader's buffers.
 */
export class UserDataFieldCodec {
  static decode(buffer: Uint8Array): UserDataField {
    return { data: Buffer.from(buffer) };
  }

  static encode(field: UserDataField): Buffer {
    return Buffer.from(field.data);
  }
}
