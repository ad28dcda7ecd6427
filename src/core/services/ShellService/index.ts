export { ShellServiceTag, ShellServiceLive, ShellError, commandLine } from "./ShellService"
export type { ShellService, ShellResult, ExecOptions } from "./ShellService"
