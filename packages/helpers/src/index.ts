export { bytesToHex, hexToBytes, isHexString } from "./encoding";
export { bytesEqual, compareBytes, concatBytes, copyBytes, toUint8Array } from "./bytes";
export type { BytesLike } from "./bytes";
