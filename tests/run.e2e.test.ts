import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { EventEmitter } from "node:events";
import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { RuntimeSettings } from "../src/config/settings.js";
import type { MaterializeRequest } from "../src/environment/materializer.js";
import { EnvironmentStager } from "../src/environment/stager.js";
import { ExtractionError, InvalidOptionsError, RunAbortedError, SpawnError } from "../src/errors.js";
import type { ProvisionerRequest } from "../src/launchers/provisioner.js";
import type { SessionRequest } from "../src/launchers/session.js";
import { run, type RunDependencies } from "../src/run.js";
import type { SupervisionState } from "../src/supervision/loop.js";
import { writeArchive } from "./helpers/archives.js";
import { FakeProcess } from "./helpers/fakeProcess.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const SETTINGS: RuntimeSettings = {
  pollIntervalMs: 5,
  terminateGraceMs: 100,
  logLevel: "debug",
  logFile: null,
  executables: {
    conda: "conda",
    vineFactory: "vine_factory",
    jupyter: "jupyter",
    ponchoPackageCreate: "poncho_package_create",
  },
};

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

async function runFailure(promise: Promise<unknown>): Promise<RunAbortedError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RunAbortedError) {
      return error;
    }
    throw error;
  }
  throw new Error("run was expected to abort");
}

describe("run (end to end with in-process fakes)", () => {
  let workspace: string;
  let baseDir: string;
  let logger: RecordingLogger;
  let signalTarget: EventEmitter;
  let exit: sinon.SinonStub;
  let provisionerRequests: ProvisionerRequest[];
  let sessionRequests: SessionRequest[];
  let provisioner: FakeProcess;
  let session: FakeProcess;
  let fixup: sinon.SinonStub;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "floability-run-"));
    baseDir = path.join(workspace, "base");
    await mkdir(baseDir);
    logger = new RecordingLogger();
    signalTarget = new EventEmitter();
    exit = sinon.stub();
    provisionerRequests = [];
    sessionRequests = [];
    provisioner = new FakeProcess("vine_factory", 900);
    session = new FakeProcess("jupyterlab", 901);
    fixup = sinon.stub().resolves("");
  });

  afterEach(async () => {
    sinon.restore();
    await rm(workspace, { recursive: true, force: true });
  });

  function dependencies(overrides: Partial<RunDependencies> = {}): RunDependencies {
    return {
      logger,
      settings: SETTINGS,
      signalTarget,
      exit,
      stager: new EnvironmentStager({ logger, fixup }),
      launchProvisioner: async (request) => {
        provisionerRequests.push(request);
        return provisioner;
      },
      launchSession: async (request) => {
        sessionRequests.push(request);
        return session;
      },
      ...overrides,
    };
  }

  async function validArchive(): Promise<string> {
    return writeArchive(
      workspace,
      "env.tar.gz",
      [
        { name: "bin/python", content: "#!/bin/sh\n", mode: 0o755 },
        { name: "etc/conda/activate.d/env_vars.sh", content: "export FOO=1" },
      ],
      { gzip: true },
    );
  }

  it("stages the environment, supervises both children and releases everything once", async () => {
    const archive = await validArchive();
    provisioner.exit();
    const states: SupervisionState[] = [];

    const result = await run(
      { environment: archive, managerName: "test-mgr", baseDir, workers: 3, coresPerWorker: 2, jupyterPort: 9999 },
      dependencies({ onStateChange: (state) => states.push(state) }),
    );

    expect(path.dirname(result.runDir)).to.equal(baseDir);
    expect(path.basename(result.runDir).startsWith("floability_run_")).to.equal(true);
    expect(result.managerName).to.equal("test-mgr");
    expect(result.stagedEnvDir).to.equal(path.join(result.runDir, "current_conda_env"));
    expect(result.outcome.reason).to.equal("provisioner_exited");
    expect(states).to.deep.equal(["PROVISIONER_EXITED", "DONE"]);

    expect(provisionerRequests).to.deep.equal([
      {
        batchType: "local",
        managerName: "test-mgr",
        minWorkers: 1,
        maxWorkers: 3,
        coresPerWorker: 2,
        envArchive: archive,
        runDir: result.runDir,
      },
    ]);
    expect(sessionRequests).to.deep.equal([
      { notebookPath: null, port: 9999, runDir: result.runDir, stagedEnvDir: result.stagedEnvDir },
    ]);
    sinon.assert.calledOnce(fixup);

    expect(result.cleanup).to.deep.equal({
      terminated: ["vine_factory", "jupyterlab"],
      removed: [result.stagedEnvDir],
      failures: [],
    });
    expect(session.terminateCalls).to.equal(1);
    expect(await pathExists(path.join(result.runDir, "current_conda_env"))).to.equal(false);
    expect(await pathExists(result.runDir)).to.equal(true);
    expect(logger.messages().filter((message) => message === "cleanup_started")).to.have.length(1);
    expect(signalTarget.listenerCount("SIGINT")).to.equal(0);
    sinon.assert.notCalled(exit);
  });

  it("writes the manager name into the staged activation script before launching", async () => {
    const archive = await validArchive();
    provisioner.exit();
    let scriptAtLaunch = "";

    await run(
      { environment: archive, managerName: "test-mgr", baseDir },
      dependencies({
        launchProvisioner: async (request) => {
          scriptAtLaunch = await readFile(
            path.join(request.runDir, "current_conda_env", "etc", "conda", "activate.d", "env_vars.sh"),
            "utf8",
          );
          return provisioner;
        },
      }),
    );

    expect(scriptAtLaunch).to.equal("export FOO=1\nexport VINE_MANAGER_NAME=test-mgr\n");
  });

  it("aborts in the stage phase for a zero-byte archive without launching anything", async () => {
    const archive = path.join(workspace, "empty.tar.gz");
    await writeFile(archive, "");
    const launchProvisioner = sinon.stub().rejects(new Error("must not be called"));
    const launchSession = sinon.stub().rejects(new Error("must not be called"));

    const error = await runFailure(
      run({ environment: archive, managerName: "test-mgr", baseDir }, dependencies({ launchProvisioner, launchSession })),
    );

    expect(error.phase).to.equal("stage");
    expect(error.cause).to.be.instanceOf(ExtractionError);
    sinon.assert.notCalled(launchProvisioner);
    sinon.assert.notCalled(launchSession);

    const runDirs = await readdir(baseDir);
    expect(runDirs).to.have.length(1);
    expect(await readdir(path.join(baseDir, runDirs.join("")))).to.deep.equal([]);
    expect(logger.messages().filter((message) => message === "cleanup_started")).to.have.length(1);
    expect(logger.messages("error")).to.include("run_aborted");
  });

  it("aborts in the spawn phase and terminates the provisioner when the session cannot start", async () => {
    const archive = await validArchive();
    const spawnFailure = new SpawnError("failed to start jupyterlab (jupyter): spawn jupyter ENOENT");

    const error = await runFailure(
      run(
        { environment: archive, managerName: "test-mgr", baseDir },
        dependencies({
          launchSession: async () => {
            throw spawnFailure;
          },
        }),
      ),
    );

    expect(error.phase).to.equal("spawn");
    expect(error.cause).to.equal(spawnFailure);
    expect(provisioner.terminateCalls).to.equal(1);
    expect(provisioner.isAlive()).to.equal(false);
    const runDirs = await readdir(baseDir);
    expect(runDirs).to.have.length(1);
    expect(await pathExists(path.join(baseDir, runDirs.join(""), "current_conda_env"))).to.equal(false);
  });

  it("aborts in the allocate phase when the base directory is missing", async () => {
    const error = await runFailure(run({ baseDir: path.join(workspace, "missing") }, dependencies()));

    expect(error.phase).to.equal("allocate");
    expect(error.cause).to.have.property("code", "E-ALLOC");
  });

  it("rejects a manager name that is not a plain token before allocating anything", async () => {
    const error = await runFailure(run({ managerName: "evil; rm -rf /", baseDir }, dependencies()));

    expect(error.phase).to.equal("options");
    expect(error.cause).to.be.instanceOf(InvalidOptionsError);
    expect(await readdir(baseDir)).to.deep.equal([]);
  });

  it("materialises an environment description into the run directory", async () => {
    const archive = await validArchive();
    const envFile = path.join(workspace, "environment.yml");
    await writeFile(envFile, "name: demo\n");
    provisioner.exit();
    const requests: MaterializeRequest[] = [];

    const result = await run(
      { environment: envFile, managerName: "test-mgr", baseDir },
      dependencies({
        materialize: async (request) => {
          requests.push(request);
          return archive;
        },
      }),
    );

    expect(requests).to.deep.equal([{ envFile, managerName: "test-mgr", runDir: result.runDir }]);
    expect(provisionerRequests[0]?.envArchive).to.equal(archive);
  });

  it("fetches declared data before staging and skips staging without an environment", async () => {
    provisioner.exit();
    const fetchData = sinon.stub().resolves([]);

    const result = await run(
      { managerName: "test-mgr", baseDir, dataSpec: "data.yml", backpackRoot: workspace },
      dependencies({ fetchData }),
    );

    sinon.assert.calledOnceWithExactly(fetchData, "data.yml", workspace);
    expect(result.stagedEnvDir).to.equal(null);
    expect(provisionerRequests[0]?.envArchive).to.equal(null);
    expect(sessionRequests[0]?.stagedEnvDir).to.equal(null);
    expect(result.cleanup.removed).to.deep.equal([]);
  });

  it("generates a manager name when none is given", async () => {
    provisioner.exit();

    const result = await run({ baseDir }, dependencies());

    expect(result.managerName).to.match(/^floability-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(provisionerRequests[0]?.managerName).to.equal(result.managerName);
  });

  it("shares one cleanup pass between SIGINT and the end of supervision", async () => {
    const archive = await validArchive();
    const exited = new Promise<void>((resolve) => {
      exit.callsFake(() => resolve());
    });

    const running = run(
      { environment: archive, managerName: "test-mgr", baseDir },
      dependencies({
        launchSession: async (request) => {
          sessionRequests.push(request);
          // Interrupt as soon as both children are up.
          setImmediate(() => signalTarget.emit("SIGINT"));
          return session;
        },
      }),
    );
    await exited;
    const result = await running;

    sinon.assert.calledOnceWithExactly(exit, 130);
    expect(provisioner.terminateCalls).to.equal(1);
    expect(session.terminateCalls).to.equal(1);
    expect(result.cleanup.removed).to.deep.equal([result.stagedEnvDir]);
    expect(logger.messages().filter((message) => message === "cleanup_started")).to.have.length(1);
  });
});
