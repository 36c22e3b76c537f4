export { PrimaryHeaderCodec } from "./primary-header.ts";
export { SecondaryHeaderCodec } from "./secondary-header.ts";
export { UserDataFieldCodec } from "./user-data-field.ts";
