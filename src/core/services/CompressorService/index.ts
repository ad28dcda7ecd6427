export {
  CompressorServiceTag,
  CompressorServiceLive,
  CompressorNotFound,
  CompressorFailed,
  NoArchivesProduced,
} from "./CompressorService"
export type { CompressorService, CompressorError, CompressionTarget } from "./CompressorService"
