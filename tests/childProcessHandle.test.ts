import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { ChildProcess } from "node:child_process";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import process from "node:process";
import { setTimeout as delay } from "node:timers/promises";

import { ChildProcessHandle } from "../src/childProcessHandle.js";
import { createCommandRunner } from "../src/environment/command.js";
import { SpawnError } from "../src/errors.js";
import { InvalidChildProcessCommandError, createChildProcessGateway } from "../src/gateways/childProcess.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Polls {@link file} until it contains {@link marker}. */
async function waitForContent(file: string, marker: string, timeoutMs = 5_000): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const content = await readFile(file, "utf8").catch(() => "");
    if (content.includes(marker)) {
      return content;
    }
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting for ${marker} in ${file}`);
    }
    await delay(20);
  }
}

describe("childProcessHandle", () => {
  let workspace: string;
  let logger: RecordingLogger;
  const handles: ChildProcessHandle[] = [];

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "floability-child-"));
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    sinon.restore();
    await Promise.all(handles.splice(0).map((handle) => handle.terminate({ graceMs: 200 }).catch(() => undefined)));
    await rm(workspace, { recursive: true, force: true });
  });

  async function spawnNode(label: string, script: string, logFile?: string): Promise<ChildProcessHandle> {
    const handle = await ChildProcessHandle.spawn({
      label,
      command: process.execPath,
      args: ["-e", script],
      logger,
      ...(logFile ? { logFile } : {}),
    });
    handles.push(handle);
    return handle;
  }

  it("raises SpawnError when the executable does not exist", async () => {
    let caught: unknown;
    try {
      await ChildProcessHandle.spawn({ label: "ghost", command: path.join(workspace, "no-such-binary"), logger });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(SpawnError);
    expect(caught).to.have.property("code", "E-SPAWN");
    expect(logger.messages()).to.not.include("child_spawned");
  });

  it("raises SpawnError for an empty command", async () => {
    let caught: unknown;
    try {
      await ChildProcessHandle.spawn({ label: "empty", command: " ", logger });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(SpawnError);
    expect(caught).to.have.property("cause").that.is.instanceOf(InvalidChildProcessCommandError);
  });

  it("terminates a running child with SIGTERM and treats repeated calls as no-ops", async () => {
    const handle = await spawnNode("sleeper", "setInterval(() => {}, 1000);");
    expect(handle.isAlive()).to.equal(true);
    expect(handle.pid).to.be.a("number");

    const first = handle.terminate({ graceMs: 2_000 });
    const concurrent = handle.terminate({ graceMs: 2_000 });
    expect(concurrent).to.equal(first);

    const outcome = await first;
    expect(outcome).to.deep.equal({ alreadyExited: false, forced: false, code: null, signal: "SIGTERM" });
    expect(handle.isAlive()).to.equal(false);

    const again = await handle.terminate();
    expect(again.forced).to.equal(false);
    expect(again.signal).to.equal("SIGTERM");
  });

  it("escalates to SIGKILL when the child ignores SIGTERM", async () => {
    const logFile = path.join(workspace, "stubborn.log");
    const handle = await spawnNode(
      "stubborn",
      "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000); console.log('ready');",
      logFile,
    );
    await waitForContent(logFile, "ready");

    const outcome = await handle.terminate({ graceMs: 200 });

    expect(outcome.forced).to.equal(true);
    expect(outcome.signal).to.equal("SIGKILL");
    expect(handle.isAlive()).to.equal(false);
    expect(logger.messages("warn")).to.include("child_kill_escalated");
  });

  it("reports a child that already exited on its own", async () => {
    const handle = await spawnNode("short", "process.exit(3);");

    expect(await handle.waitForExit()).to.deep.equal({ code: 3, signal: null });
    expect(handle.isAlive()).to.equal(false);
    expect(handle.exitStatus).to.deep.equal({ code: 3, signal: null });
    expect(await handle.terminate()).to.deep.equal({ alreadyExited: true, forced: false, code: 3, signal: null });
  });

  it("appends stdout and stderr to the log file", async () => {
    const logFile = path.join(workspace, "output.log");
    const handle = await spawnNode("chatty", "console.log('to stdout'); console.error('to stderr');", logFile);
    await handle.waitForExit();

    const content = await waitForContent(logFile, "to stderr");
    expect(content).to.contain("to stdout\n");
  });

  it("keeps the child running when its log file cannot be opened", async () => {
    const logFile = path.join(workspace, "missing-dir", "child.log");
    const handle = await spawnNode(
      "unlogged",
      "for (let i = 0; i < 2000; i += 1) console.log('x'.repeat(100)); setInterval(() => {}, 1000);",
      logFile,
    );

    const deadline = Date.now() + 5_000;
    while (!logger.messages("warn").includes("child_log_failed")) {
      if (Date.now() > deadline) {
        throw new Error("timed out waiting for child_log_failed");
      }
      await delay(20);
    }

    const failure = logger.entries.find((entry) => entry.message === "child_log_failed");
    expect(failure?.payload).to.include({ label: "unlogged", log_file: logFile });
    expect(handle.isAlive()).to.equal(true);

    const outcome = await handle.terminate({ graceMs: 2_000 });
    expect(outcome).to.include({ alreadyExited: false, signal: "SIGTERM" });
  });

  describe("gateway", () => {
    it("never uses a shell and applies environment overrides", () => {
      const fakeChild = new ChildProcess();
      const spawnImpl = sinon.stub().returns(fakeChild);
      const gateway = createChildProcessGateway({ spawnImpl });

      const child = gateway.spawn({
        command: "vine_factory",
        args: ["--batch-type=local"],
        cwd: "/runs/r1",
        inheritEnv: { PATH: "/usr/bin", SECRET: "test-secret" },
        envOverrides: { SECRET: undefined, EXTRA: "1" },
      });

      expect(child).to.equal(fakeChild);
      sinon.assert.calledOnce(spawnImpl);
      const [command, args, options] = spawnImpl.firstCall.args;
      expect(command).to.equal("vine_factory");
      expect(args).to.deep.equal(["--batch-type=local"]);
      expect(options).to.include({ shell: false, cwd: "/runs/r1", stdio: "pipe" });
      expect(options.env).to.deep.equal({ PATH: "/usr/bin", EXTRA: "1" });
    });
  });

  describe("command runner", () => {
    it("captures interleaved output and the exit status", async () => {
      const runner = createCommandRunner();

      const result = await runner({
        command: process.execPath,
        args: ["-e", "console.log('out'); console.error('err'); process.exitCode = 4;"],
      });

      expect(result.exitCode).to.equal(4);
      expect(result.signal).to.equal(null);
      expect(result.output).to.contain("out\n");
      expect(result.output).to.contain("err\n");
    });

    it("rejects when the command cannot be started", async () => {
      const runner = createCommandRunner();

      let caught: unknown;
      try {
        await runner({ command: path.join(workspace, "missing-tool"), args: [] });
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(Error);
      expect(caught).to.have.property("code", "ENOENT");
    });
  });
});
