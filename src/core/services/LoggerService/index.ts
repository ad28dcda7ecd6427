export { LoggerServiceTag, LoggerServiceLive } from "./LoggerService"
export type { LoggerService } from "./LoggerService"
