import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { EventEmitter } from "node:events";

import { CleanupRegistry } from "../src/cleanup/registry.js";
import { SignalBridge } from "../src/cleanup/signals.js";
import { FakeProcess } from "./helpers/fakeProcess.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Resolves once {@link exit} has been called. */
function exited(exit: sinon.SinonStub): Promise<void> {
  return new Promise((resolve) => {
    exit.callsFake(() => resolve());
  });
}

function createBridge(options: { removeDirectory?: (directory: string) => Promise<void> } = {}) {
  const logger = new RecordingLogger();
  const registry = new CleanupRegistry({
    logger,
    removeDirectory: options.removeDirectory ?? (async () => undefined),
  });
  const target = new EventEmitter();
  const exit = sinon.stub();
  const bridge = new SignalBridge({ registry, logger, target, exit });
  return { logger, registry, target, exit, bridge };
}

describe("cleanup/signals", () => {
  it("runs the cleanup pass and exits with 130 on SIGINT", async () => {
    const { registry, target, exit, bridge, logger } = createBridge();
    const provisioner = new FakeProcess("vine_factory", 11);
    registry.registerProcess(provisioner);
    bridge.install();
    const done = exited(exit);

    target.emit("SIGINT");
    await done;

    sinon.assert.calledOnceWithExactly(exit, 130);
    expect(provisioner.terminateCalls).to.equal(1);
    expect(bridge.receivedSignal).to.equal("SIGINT");
    expect(logger.messages()).to.include.members(["shutdown_signal", "cleanup_completed", "shutdown_complete"]);
  });

  it("exits with 143 on SIGTERM", async () => {
    const { target, exit, bridge } = createBridge();
    bridge.install();
    const done = exited(exit);

    target.emit("SIGTERM");
    await done;

    sinon.assert.calledOnceWithExactly(exit, 143);
  });

  it("ignores a second signal while the first shutdown is in progress", async () => {
    let releaseRemoval: () => void = () => undefined;
    const removal = new Promise<void>((resolve) => {
      releaseRemoval = resolve;
    });
    const { registry, target, exit, bridge, logger } = createBridge({ removeDirectory: () => removal });
    registry.registerDirectory("/runs/r1/current_conda_env");
    const provisioner = new FakeProcess("vine_factory", 12);
    registry.registerProcess(provisioner);
    bridge.install();
    const done = exited(exit);

    target.emit("SIGINT");
    target.emit("SIGTERM");
    releaseRemoval();
    await done;

    sinon.assert.calledOnceWithExactly(exit, 130);
    expect(provisioner.terminateCalls).to.equal(1);
    expect(logger.messages("warn")).to.include("shutdown_signal_repeated");
  });

  it("joins a cleanup pass that normal shutdown already started", async () => {
    const { registry, target, exit, bridge } = createBridge();
    const provisioner = new FakeProcess("vine_factory", 13);
    registry.registerProcess(provisioner);
    bridge.install();
    const done = exited(exit);

    const normal = registry.cleanup();
    target.emit("SIGTERM");
    await Promise.all([normal, done]);

    expect(provisioner.terminateCalls).to.equal(1);
    sinon.assert.calledOnceWithExactly(exit, 143);
  });

  it("refuses to install twice and detaches its listeners on uninstall", () => {
    const { target, bridge } = createBridge();
    bridge.install();

    expect(() => bridge.install()).to.throw("signal bridge is already installed");
    expect(target.listenerCount("SIGINT")).to.equal(1);
    expect(target.listenerCount("SIGTERM")).to.equal(1);

    bridge.uninstall();
    expect(bridge.isInstalled).to.equal(false);
    expect(target.listenerCount("SIGINT")).to.equal(0);
    expect(target.listenerCount("SIGTERM")).to.equal(0);
  });

  it("warns when installed after obligations were registered", () => {
    const { registry, bridge, logger } = createBridge();
    registry.registerDirectory("/runs/r1");

    bridge.install();

    expect(logger.messages("warn")).to.deep.equal(["signal_bridge_installed_late"]);
  });
});
