import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { delimiter, join } from "node:path"
import { ConfigProvider, Effect, Layer, Option, pipe } from "effect"
import { NodeContext } from "@effect/platform-node"
import { ShellServiceLive, ShellServiceTag, commandLine } from "./ShellService"

describe("ShellService", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "shell-test-"))
    await mkdir(join(dir, "first"))
    await mkdir(join(dir, "second"))
    await mkdir(join(dir, "second", "7z-dir"))
    await writeFile(join(dir, "first", "7z"), "not a program\n", { mode: 0o644 })
    await writeFile(join(dir, "second", "7z"), "#!/bin/sh\n", { mode: 0o755 })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  const which = (command: string, searchPath: string) =>
    pipe(
      Effect.flatMap(ShellServiceTag, (shell) => shell.which(command)),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["PATH", searchPath]]))),
      Effect.provide(pipe(ShellServiceLive, Layer.provide(NodeContext.layer))),
      Effect.runPromise
    )

  test("which walks PATH in order", async () => {
    const searchPath = [join(dir, "missing"), join(dir, "first"), join(dir, "second")].join(delimiter)

    const resolved = await which("7z", searchPath)

    expect(Option.getOrUndefined(resolved)).toBe(join(dir, "second", "7z"))
  })

  test("which skips files without an execute bit", async () => {
    const resolved = await which("7z", join(dir, "first"))

    expect(Option.isNone(resolved)).toBe(true)
  })

  test("which ignores directories that share the name", async () => {
    const resolved = await which("7z-dir", join(dir, "second"))

    expect(Option.isNone(resolved)).toBe(true)
  })

  test("which on an empty PATH finds nothing", async () => {
    const resolved = await which("7z", "")

    expect(Option.isNone(resolved)).toBe(true)
  })

  test("which checks an explicit path without consulting PATH", async () => {
    const explicit = join(dir, "second", "7z")

    expect(Option.getOrUndefined(await which(explicit, ""))).toBe(explicit)
    expect(Option.isNone(await which(join(dir, "first", "7z"), ""))).toBe(true)
  })

  test("commandLine joins program and arguments", () => {
    expect(commandLine("du", ["-sm", "--", "A"])).toBe("du -sm -- A")
  })
})
