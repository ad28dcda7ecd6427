export { SweepServiceTag, SweepServiceLive, EmptySweep } from "./SweepService"
export type { SweepService } from "./SweepService"
