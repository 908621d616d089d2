export { compressDirectory, packZip } from "./pack";
export type { CompressOptionsFS, PackOptionsFS, UnpackOptionsFS } from "./types";
export { extractTarGz, unpackTar } from "./unpack";
