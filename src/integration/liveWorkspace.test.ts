/**
 * Tune runs against the live workspace on a real temporary directory. Only
 * the shell is replaced: `du` and `7z` are emulated in process, resolving
 * their arguments against the working directory they are started in the
 * way the real programs would.
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { mkdir, mkdtemp, readdir, rm, symlink, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join, relative, resolve } from "node:path"
import { Effect, Layer, Option, pipe } from "effect"
import { NodeContext } from "@effect/platform-node"

import { tuneParameters, probeWorkspace } from "@core"
import { ShellServiceTag, type ShellResult } from "@services/ShellService"
import { WorkspaceServiceLive } from "@services/WorkspaceService"
import { SizeProbeServiceLive } from "@services/SizeProbeService"
import { CompressorServiceLive } from "@services/CompressorService"
import { SweepServiceLive } from "@services/SweepService"
import { LoggerServiceTag } from "@services/LoggerService"

const ARCHIVE_CONTENT = "7z-archive"

const emulatedShell = (archivePaths: string[]) =>
  Layer.succeed(ShellServiceTag, {
    exec: (command, args, options = {}) => {
      const cwd = options.cwd ?? process.cwd()
      const operands = args.slice(args.indexOf("--") + 1)

      if (command === "du") {
        const stdout = operands.map((name) => `1\t${name}\n`).join("")
        return Effect.succeed<ShellResult>({ stdout, stderr: "", exitCode: 0 })
      }

      const archive = resolve(cwd, operands[0] ?? "")
      archivePaths.push(operands[0] ?? "")
      return pipe(
        Effect.promise(() => readdir(dirname(archive)).then(() => true, () => false)),
        Effect.flatMap((parentExists) =>
          parentExists
            ? Effect.as(
                Effect.promise(() => writeFile(archive, ARCHIVE_CONTENT)),
                { stdout: "Everything is Ok\n", stderr: "", exitCode: 0 }
              )
            : Effect.succeed({ stdout: "", stderr: `cannot open ${archive}`, exitCode: 2 })
        )
      )
    },
    which: (command) => Effect.succeed(Option.some(`/usr/bin/${command}`)),
  })

const silentLogger = Layer.succeed(LoggerServiceTag, {
  tune: {
    header: () => Effect.void,
    compressorFound: () => Effect.void,
    directories: () => Effect.void,
    sweepStarted: () => Effect.void,
    candidate: () => Effect.void,
    measured: () => Effect.void,
    best: () => Effect.void,
    finalRun: () => Effect.void,
    complete: () => Effect.void,
  },
  probe: {
    header: () => Effect.void,
    directories: () => Effect.void,
    candidates: () => Effect.void,
  },
})

const buildLiveLayer = (archivePaths: string[]) => {
  const infra = Layer.mergeAll(emulatedShell(archivePaths), silentLogger, NodeContext.layer)
  const Workspace = pipe(WorkspaceServiceLive, Layer.provide(NodeContext.layer))
  const Services = pipe(
    Layer.mergeAll(SizeProbeServiceLive, CompressorServiceLive),
    Layer.provide(Workspace),
    Layer.provide(infra)
  )
  const Sweeps = pipe(SweepServiceLive, Layer.provide(Services), Layer.provide(infra))
  return Layer.mergeAll(Services, Sweeps, Workspace, infra)
}

describe("tuneParameters on a real directory", () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "live-tune-"))
    await mkdir(join(root, "A"))
    await mkdir(join(root, "B"))
    await writeFile(join(root, "A", "data.txt"), "alpha")
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  test("a root relative to the current directory compresses into that root", async () => {
    const archivePaths: string[] = []
    const relativeRoot = relative(process.cwd(), root)

    const result = await pipe(
      tuneParameters({ root: relativeRoot, binary: "7z", exclude: [], maxThreads: 1 }),
      Effect.provide(buildLiveLayer(archivePaths)),
      Effect.runPromise
    )

    expect(result.finalArchiveBytes).toBe(2 * ARCHIVE_CONTENT.length)
    expect(archivePaths.every((archive) => archive.startsWith(`${root}/`))).toBe(true)
    expect((await readdir(root)).sort()).toEqual(["A", "A.7z", "B", "B.7z"])
  })

  test("a dangling symlink in the root is skipped", async () => {
    await symlink(join(root, "missing-target"), join(root, "dangling"))

    const result = await pipe(
      tuneParameters({ root, binary: "7z", exclude: [], maxThreads: 1 }),
      Effect.provide(buildLiveLayer([])),
      Effect.runPromise
    )

    expect(result.finalArchiveBytes).toBe(2 * ARCHIVE_CONTENT.length)
    expect((await readdir(root)).sort()).toEqual(["A", "A.7z", "B", "B.7z", "dangling"])
  })

  test("directory sizes are read from a relative root", async () => {
    const result = await pipe(
      probeWorkspace({ root: relative(process.cwd(), root), exclude: [], maxThreads: 1 }),
      Effect.provide(buildLiveLayer([])),
      Effect.runPromise
    )

    expect(result.directories).toEqual([
      { name: "A", sizeMB: 1 },
      { name: "B", sizeMB: 1 },
    ])
  })
})
