export {
  SizeProbeServiceTag,
  SizeProbeServiceLive,
  SizeProbeFailed,
  SizeProbeParseFailed,
  parseDuOutput,
} from "./SizeProbeService"
export type { SizeProbeService, SizeProbeError } from "./SizeProbeService"
