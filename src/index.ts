export { extractArchive } from "./fs/extract.js";
export { createMaterializer } from "./fs/materialize.js";
export type {
	Materializer,
	MaterializerOptions,
} from "./fs/materialize.js";
export type { ExtractOptions, ExtractResult, OutputFile } from "./fs/types.js";
export { createLogger, type Logger, type LogLevel } from "./logger.js";
export { validateChecksum } from "./tar/checksum.js";
export { UntarError, UntarErrorCode } from "./tar/errors.js";
export { parseHeader } from "./tar/header.js";
export { type BlockReader, createBlockReader } from "./tar/reader.js";
export type { ArchiveSource, UstarEntryType, UstarHeader } from "./tar/types.js";
export { isZeroBlock, parseOctal } from "./tar/utils.js";
