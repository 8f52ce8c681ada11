import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "jsonval", ...args]

const cliErrorMessage = (args: ReadonlyArray<string>): string => {
  const parsed = parseCliArgs(argv(...args))
  return Either.isLeft(parsed) ? parsed.left.message : "parsed"
}

describe("parseCliArgs", () => {
  it.effect("defaults to format and leaves unset options undefined", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(parseCliArgs(argv("--input", "in.json")))
      expect(parsed).toEqual({
        command: "format",
        input: "in.json",
        output: undefined,
        indent: undefined,
        ascii: undefined,
        encoding: undefined,
        configPath: undefined,
        silent: false
      })
    }))

  it.effect("reads commands, inline values and boolean switches", () =>
    Effect.sync(() => {
      const parsed = Either.getOrThrow(
        parseCliArgs(argv("minify", "--input=in.json", "--output", "out.json", "--ascii", "--indent=4", "--silent"))
      )
      expect(parsed.command).toBe("minify")
      expect(parsed.output).toBe("out.json")
      expect(parsed.ascii).toBe(true)
      expect(parsed.indent).toBe(4)
      expect(parsed.silent).toBe(true)
      expect(Either.getOrThrow(parseCliArgs(argv("check", "--input", "a", "--ascii", "false"))).ascii).toBe(false)
    }))

  it.effect("rejects malformed arguments", () =>
    Effect.sync(() => {
      expect(cliErrorMessage(["pretty", "--input", "a"])).toBe("Unknown command: pretty")
      expect(cliErrorMessage(["--input", "a", "--bogus"])).toBe("Unknown flag: --bogus")
      expect(cliErrorMessage(["--input", "a", "-x"])).toBe("Unknown flag: -x")
      expect(cliErrorMessage(["--input"])).toBe("Missing value for --input")
      expect(cliErrorMessage(["--input", "a", "--indent", "-1"])).toBe("Missing value for --indent")
      expect(cliErrorMessage(["--input", "a", "--indent=-1"])).toBe(
        "Invalid indent: -1 (expected a non-negative integer)"
      )
      expect(cliErrorMessage(["--input", "a", "--indent", "1.5"])).toBe(
        "Invalid indent: 1.5 (expected a non-negative integer)"
      )
      expect(cliErrorMessage(["--input", "a", "--indent", "99999999999"])).toBe(
        "Invalid indent: 99999999999 (maximum is 256)"
      )
      expect(Either.getOrThrow(parseCliArgs(argv("--input", "a", "--indent", "256"))).indent).toBe(256)
      expect(cliErrorMessage(["--input", "a", "stray"])).toBe("Unexpected positional argument: stray")
      expect(cliErrorMessage(["format"])).toBe("Missing required flag --input")
    }))
})

describe("resolveConfig", () => {
  it.effect("prefers CLI flags, then the config file, then defaults", () =>
    Effect.sync(() => {
      const cli = Either.getOrThrow(parseCliArgs(argv("--input", "a", "--indent", "1")))
      expect(resolveConfig(cli, { indent: 8, ascii: true })).toEqual({ indent: 1, ascii: true, encoding: "utf-8" })
      const bare = Either.getOrThrow(parseCliArgs(argv("--input", "a")))
      expect(resolveConfig(bare, undefined)).toEqual({ indent: 2, ascii: false, encoding: "utf-8" })
    }))
})
