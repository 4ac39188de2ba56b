import { FileSystem } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { Effect } from "effect";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { makeRecordingLogger, TEST_CONFIG } from "../core/testing/test-services";
import {
  CommandAudioPlayer,
  defaultPlayerCommand,
  resolvePlayerCommand,
  type CommandRunner,
} from "./audio-player";

describe("player command", () => {
  it("should pick a player per platform", () => {
    expect(defaultPlayerCommand("darwin")).toEqual({ command: "afplay", args: [] });
    expect(defaultPlayerCommand("linux")).toEqual({ command: "mpg123", args: ["-q"] });
    expect(defaultPlayerCommand("win32")).toEqual({
      command: "ffplay",
      args: ["-nodisp", "-autoexit", "-loglevel", "quiet"],
    });
  });

  it("should use the configured command when there is one", () => {
    expect(resolvePlayerCommand({ command: "paplay" })).toEqual({ command: "paplay", args: [] });
    expect(resolvePlayerCommand({ command: "play", args: ["-q"] })).toEqual({
      command: "play",
      args: ["-q"],
    });
  });
});

describe("CommandAudioPlayer", () => {
  let dir = "";
  let fs: FileSystem.FileSystem;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "carillon-sounds-"));
    await writeFile(path.join(dir, "Bell.mp3"), "");
    fs = await Effect.runPromise(FileSystem.FileSystem.pipe(Effect.provide(NodeFileSystem.layer)));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function makePlayer(run: CommandRunner) {
    const sounds = { ...TEST_CONFIG.sounds, basePath: dir };
    return new CommandAudioPlayer(sounds, { command: "mpg123", args: ["-q"] }, fs, makeRecordingLogger(), run);
  }

  const neverRun: CommandRunner = () => Effect.dieMessage("player should not run");

  it("should add the extension only when it is missing", () => {
    const player = makePlayer(neverRun);
    expect(player.resolvePath("Bell")).toBe(path.join(dir, "Bell.mp3"));
    expect(player.resolvePath("Bell.MP3")).toBe(path.join(dir, "Bell.MP3"));
    expect(player.resolvePath("peals/Easter")).toBe(path.join(dir, "peals", "Easter.mp3"));
  });

  it("should report which sounds exist", async () => {
    const player = makePlayer(neverRun);
    const result = await Effect.runPromise(
      Effect.all([player.isAvailable("Bell"), player.isAvailable("Toll")]),
    );
    expect(result).toEqual([true, false]);
  });

  it("should run the player with the resolved file last", async () => {
    const calls: (readonly string[])[] = [];
    const player = makePlayer((command, args) =>
      Effect.sync(() => {
        calls.push([command, ...args]);
        return "";
      }),
    );

    await Effect.runPromise(player.play("Bell"));

    expect(calls).toEqual([["mpg123", "-q", path.join(dir, "Bell.mp3")]]);
  });

  it("should fail as missing without running the player", async () => {
    const player = makePlayer(neverRun);
    const error = await Effect.runPromise(Effect.flip(player.play("Toll")));

    expect(error.reason).toBe("missing");
    expect(error.path).toBe(path.join(dir, "Toll.mp3"));
  });

  it("should fail when the player exits with an error", async () => {
    const player = makePlayer(() => Effect.fail(new Error("Command failed (exit 1): bad file")));
    const error = await Effect.runPromise(Effect.flip(player.play("Bell")));

    expect(error.reason).toBe("failed");
    expect(error.detail).toBe("Command failed (exit 1): bad file");
  });
});
