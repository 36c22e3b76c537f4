/**
 * Opaque user data carried between the secondary header and the checksum
 */
export interface UserDataField {
  readonly data: Buffer;
}
