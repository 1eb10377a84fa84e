import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { buildChildEnvironment, runProfile } from "../../src/core/run/orchestrator";
import { AuthError, BackupEngineError, LogArchiveError } from "../../src/errors";
import { renderSessionScript } from "../../src/system/session";
import type { BorgrunConfig, Profile } from "../../src/types";
import {
  type Responder,
  createFakeRunner,
  fakeGateway,
  fakeSecrets,
  makeProfile,
  makeTempDir,
} from "../helpers/fakes";

const BASE_ENV = {
  HOME: "/home/test",
  PATH: "/usr/bin",
  BORG_PASSCOMMAND: "pass show borg",
};

function commandLine(command: string, args: string[]): string {
  return command === "borg" ? `borg ${args[0] ?? ""}` : command;
}

describe("runProfile", () => {
  let root: string;
  let profileDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    root = await makeTempDir("run");
    profileDir = path.join(root, "laptop");
    await fs.mkdir(profileDir);
    await fs.writeFile(path.join(profileDir, "logrotate.conf"), "logs/log {\n  rotate 12\n}\n");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  function setup(options: {
    respond?: Responder;
    mac?: string | null;
    secret?: (attributes: Record<string, string>) => Promise<string>;
    overrides?: Partial<BorgrunConfig>;
  } = {}) {
    const profile = makeProfile(profileDir, options.overrides);
    const { runner, calls } = createFakeRunner(options.respond);
    const gateway = fakeGateway(options.mac === undefined ? "AA:BB:CC:DD:EE:FF" : options.mac);
    const secrets = fakeSecrets(options.secret ?? (async () => "test-secret"));
    const loadProfile = vi.fn(async (): Promise<Profile> => profile);

    const run = (dryRun = false) =>
      runProfile(
        { profileDir, dryRun },
        { env: BASE_ENV, runner, gateway, secrets, loadProfile },
      );

    return { profile, runner, calls, gateway, secrets, loadProfile, run };
  }

  test("happy path runs create, prune, compact, then rotates the log", async () => {
    const { calls, secrets, run } = setup();

    const outcome = await run();

    expect(outcome.exitCode).toBe(0);
    expect(outcome.state).toBe("DONE");
    expect(outcome.error).toBeNull();
    expect(calls.map((call) => commandLine(call.command, call.args))).toEqual([
      "borg create",
      "borg prune",
      "borg compact",
      "logrotate",
    ]);
    expect(outcome.reached).toEqual([
      "START",
      "ConfigLoaded",
      "NetworkChecked",
      "CredentialObtained",
      "ArchiveCreated",
      "Pruned",
      "Compacted",
      "LogArchived",
      "DONE",
    ]);
    expect(secrets.lookup).toHaveBeenCalledWith({ "borg-config": "laptop" });
  });

  test("borg gets the passphrase, logrotate does not", async () => {
    const { calls, run } = setup();

    await run();

    expect(calls[0]?.options.env).toEqual({
      HOME: "/home/test",
      PATH: "/usr/bin",
      BORG_PASSPHRASE: "test-secret",
    });
    expect(calls[3]?.options.env).toEqual(BASE_ENV);
    expect(calls[3]?.options.cwd).toBe(profileDir);
  });

  test("session variables reach borg", async () => {
    const scriptPath = path.join(root, "session-env.sh");
    await fs.writeFile(
      scriptPath,
      renderSessionScript(
        { SSH_AUTH_SOCK: "/run/user/1000/ssh", DBUS_SESSION_BUS_ADDRESS: "" },
        new Date("2026-03-01T00:00:00.000Z"),
      ),
    );
    const { calls, run } = setup({ overrides: { sessionScript: scriptPath } });

    const outcome = await run();

    expect(outcome.exitCode).toBe(0);
    expect(calls[0]?.options.env).toEqual({
      HOME: "/home/test",
      PATH: "/usr/bin",
      SSH_AUTH_SOCK: "/run/user/1000/ssh",
      BORG_PASSPHRASE: "test-secret",
    });
  });

  test("a missing session script stops the run before borg", async () => {
    const { calls, run } = setup({ overrides: { sessionScript: path.join(root, "absent.sh") } });

    const outcome = await run();

    expect(outcome.exitCode).toBe(2);
    expect(outcome.error?.message).toBe(`Session script not found: ${path.join(root, "absent.sh")}`);
    expect(calls).toHaveLength(0);
  });

  test("child output and log lines land in the run log", async () => {
    const { profile, run } = setup({
      respond: (_command, args, options) => {
        if (args[0] === "create") {
          options.tee?.stdout("A /home/test/notes.txt\n");
          options.tee?.stderr("terminating with success status, rc 0\n");
        }
        return 0;
      },
    });

    await run();

    const log = await fs.readFile(profile.config.logFile, "utf8");
    const lines = log.split("\n");
    expect(lines[0]).toMatch(/^--- borgrun laptop started \d{4}-\d{2}-\d{2}T.* ---$/);
    expect(lines).toContain("A /home/test/notes.txt");
    expect(lines).toContain("terminating with success status, rc 0");
    expect(lines.some((line) => line.endsWith("INFO  Starting backup to /srv/borg/repo"))).toBe(true);
  });

  test("console tee receives child output", async () => {
    const chunks: string[] = [];
    const profile = makeProfile(profileDir);
    const { runner } = createFakeRunner((_command, args, options) => {
      if (args[0] === "create") options.tee?.stdout("borg says hi\n");
      return 0;
    });

    await runProfile(
      { profileDir },
      {
        env: BASE_ENV,
        runner,
        gateway: fakeGateway("aa:bb:cc:dd:ee:ff"),
        secrets: fakeSecrets(async () => "test-secret"),
        loadProfile: async () => profile,
        console: { stdout: (chunk) => chunks.push(chunk), stderr: () => {} },
      },
    );

    expect(chunks).toEqual(["borg says hi\n"]);
  });

  test("a gateway not on the whitelist aborts before the secret lookup", async () => {
    const { calls, secrets, run } = setup({ mac: "11:22:33:44:55:66" });

    const outcome = await run();

    expect(outcome.exitCode).toBe(3);
    expect(outcome.state).toBe("ABORTED");
    expect(outcome.reached).toEqual(["START", "ConfigLoaded", "ABORTED"]);
    expect(secrets.lookup).not.toHaveBeenCalled();
    expect(calls).toHaveLength(0);
  });

  test("an undeterminable gateway is a policy failure", async () => {
    const { calls, run } = setup({ mac: null });

    const outcome = await run();

    expect(outcome.exitCode).toBe(3);
    expect(calls).toHaveLength(0);
  });

  test("a disabled network check skips the gateway", async () => {
    const { gateway, run } = setup({
      mac: null,
      overrides: { network: { enabled: false, allowedGateways: [] } },
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(0);
    expect(gateway.resolveGatewayMac).not.toHaveBeenCalled();
  });

  test("a failed secret lookup never invokes borg", async () => {
    const { calls, run } = setup({
      secret: async () => {
        throw new AuthError("No secret stored for borg-config=laptop");
      },
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(4);
    expect(outcome.reached).toEqual(["START", "ConfigLoaded", "NetworkChecked", "ABORTED"]);
    expect(outcome.error?.message).toBe("No secret stored for borg-config=laptop");
    expect(calls).toHaveLength(0);
  });

  test("unclassified secret store errors become auth failures", async () => {
    const { run } = setup({
      secret: async () => {
        throw new Error("bus closed");
      },
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(4);
    expect(outcome.error).toBeInstanceOf(AuthError);
    expect(outcome.error?.message).toBe("bus closed");
  });

  test("a configuration error exits 2 before anything runs", async () => {
    const { runner, calls } = createFakeRunner();

    const outcome = await runProfile(
      { profileDir: path.join(root, "missing") },
      { env: BASE_ENV, runner },
    );

    expect(outcome.exitCode).toBe(2);
    expect(outcome.reached).toEqual(["START", "ABORTED"]);
    expect(calls).toHaveLength(0);
  });

  test("a failed create skips prune and compact but still rotates the log", async () => {
    const { calls, run } = setup({
      respond: (command, args) => (command === "borg" && args[0] === "create" ? 2 : 0),
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(5);
    expect(outcome.error).toBeInstanceOf(BackupEngineError);
    expect(outcome.steps).toHaveLength(1);
    expect(calls.map((call) => commandLine(call.command, call.args))).toEqual([
      "borg create",
      "logrotate",
    ]);
    expect(outcome.reached).toEqual([
      "START",
      "ConfigLoaded",
      "NetworkChecked",
      "CredentialObtained",
      "ABORTED",
    ]);
  });

  test("a failed create is recorded in the run log", async () => {
    const { profile, run } = setup({
      respond: (command, args) => (command === "borg" && args[0] === "create" ? 2 : 0),
    });

    await run();

    const lines = (await fs.readFile(profile.config.logFile, "utf8")).split("\n");
    expect(
      lines.some((line) => line.endsWith("ERROR borg create exited with code 2; remaining steps skipped")),
    ).toBe(true);
  });

  test("a refused gateway is recorded in the run log", async () => {
    const { profile, run } = setup({ mac: "11:22:33:44:55:66" });

    await run();

    const lines = (await fs.readFile(profile.config.logFile, "utf8")).split("\n");
    expect(lines[0]).toMatch(/^--- borgrun laptop started .* ---$/);
    expect(
      lines.some((line) =>
        line.endsWith("ERROR Gateway 11:22:33:44:55:66 is not in the allowed list; refusing to back up"),
      ),
    ).toBe(true);
  });

  test("a run log that cannot be opened fails the run before borg", async () => {
    const { profile, calls, run } = setup();
    await fs.mkdir(profile.config.logFile, { recursive: true });

    const outcome = await run();

    expect(outcome.exitCode).toBe(5);
    expect(outcome.error).toBeInstanceOf(BackupEngineError);
    expect(outcome.error?.message).toMatch(/^Cannot open run log: EISDIR/);
    expect(outcome.reached).toEqual(["START", "ConfigLoaded", "ABORTED"]);
    expect(calls).toHaveLength(0);
  });

  test("a failed log rotation exits 6 after a good backup", async () => {
    const { run } = setup({
      respond: (command) => (command === "logrotate" ? { exitCode: 1, stderr: "error: bad" } : 0),
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(6);
    expect(outcome.error).toBeNull();
    expect(outcome.logArchiveError).toBeInstanceOf(LogArchiveError);
    expect(outcome.logArchiveError?.message).toBe("logrotate exited with code 1: error: bad");
    expect(outcome.steps).toHaveLength(3);
    expect(outcome.reached.slice(-2)).toEqual(["Compacted", "ABORTED"]);
  });

  test("a backup failure outranks a rotation failure", async () => {
    const { run } = setup({
      respond: (command, args) => (command === "logrotate" || args[0] === "prune" ? 2 : 0),
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(5);
    expect(outcome.logArchiveError).toBeInstanceOf(LogArchiveError);
  });

  test("dry run skips compact and asks logrotate for a debug pass", async () => {
    const { calls, run } = setup();

    const outcome = await run(true);

    expect(outcome.exitCode).toBe(0);
    expect(calls.map((call) => commandLine(call.command, call.args))).toEqual([
      "borg create",
      "borg prune",
      "logrotate",
    ]);
    expect(calls[0]?.args).toContain("--dry-run");
    expect(calls[2]?.args).toContain("--debug");
    expect(outcome.reached).toEqual([
      "START",
      "ConfigLoaded",
      "NetworkChecked",
      "CredentialObtained",
      "ArchiveCreated",
      "Pruned",
      "LogArchived",
      "DONE",
    ]);
  });

  test("continueOnWarning lets a borg warning through", async () => {
    const { run } = setup({
      respond: (command, args) => (command === "borg" && args[0] === "create" ? 1 : 0),
      overrides: { borg: { ...DEFAULT_CONFIG.borg, continueOnWarning: true } },
    });

    const outcome = await run();

    expect(outcome.exitCode).toBe(0);
    expect(outcome.steps.map((step) => step.status)).toEqual(["warning", "success", "success"]);
  });
});

describe("buildChildEnvironment", () => {
  test("replaces competing passphrase sources", () => {
    const env = buildChildEnvironment(
      {
        PATH: "/usr/bin",
        BORG_PASSPHRASE: "stale",
        BORG_PASSCOMMAND: "pass show borg",
        BORG_PASSPHRASE_FD: "3",
        BORG_NEW_PASSPHRASE: "other",
      },
      "test-secret",
      { SSH_AUTH_SOCK: "/run/ssh" },
    );

    expect(env).toEqual({
      PATH: "/usr/bin",
      SSH_AUTH_SOCK: "/run/ssh",
      BORG_PASSPHRASE: "test-secret",
    });
  });

  test("leaves the base environment untouched", () => {
    const base = { BORG_PASSCOMMAND: "pass show borg" };

    buildChildEnvironment(base, "test-secret", {});

    expect(base).toEqual({ BORG_PASSCOMMAND: "pass show borg" });
  });
});
