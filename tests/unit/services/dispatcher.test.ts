import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createXenops } from "../../../src/context.ts";
import { createSilentLogger, type XenopsLogger } from "../../../src/xenops-logger.ts";
import type { CommandDispatcher } from "../../../src/services/dispatcher.ts";
import type { TransitionRequest, VmSummary } from "../../../src/lib/vm.ts";
import { PowerStateConflictError, ValidationError, VmError } from "../../../src/errors/index.ts";
import { MemoryXenopsClient } from "../../helpers/memory-client.ts";
import { captureRejection } from "../../helpers/errors.ts";

const WEB = "6f1c0c52-4a8e-4d0b-9d7e-0c8f6e2b1a01";
const DB = "6f1c0c52-4a8e-4d0b-9d7e-0c8f6e2b1a02";
const BATCH = "6f1c0c52-4a8e-4d0b-9d7e-0c8f6e2b1a03";

function recordingLogger(lines: string[], prefix = ""): XenopsLogger {
  return {
    debug: (...args) => {
      lines.push(`${prefix}${args.join(" ")}`);
    },
    withTag: (tag) => recordingLogger(lines, `[${tag}] `),
  };
}

function fixtureVms(): VmSummary[] {
  return [
    { id: WEB, name: "web", powerState: "Running" },
    { id: DB, name: "db", powerState: "Halted" },
    { id: BATCH, name: "batch", powerState: "Paused" },
  ];
}

describe("CommandDispatcher", () => {
  let client: MemoryXenopsClient;
  let xenops: CommandDispatcher;

  beforeEach(() => {
    client = new MemoryXenopsClient(fixtureVms());
    xenops = createXenops({ client, logger: createSilentLogger() });
  });

  describe("missing arguments", () => {
    it.each([
      ["remove", (x: CommandDispatcher) => x.remove(undefined)],
      ["start", (x: CommandDispatcher) => x.start(undefined, { paused: true })],
      ["shutdown", (x: CommandDispatcher) => x.shutdown(undefined, { timeout: 30 })],
      ["reboot", (x: CommandDispatcher) => x.reboot(undefined)],
      ["suspend", (x: CommandDispatcher) => x.suspend(undefined)],
    ])("%s without a VM fails before any call to xenopsd", async (command, run) => {
      const error = await captureRejection(run(xenops));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("code", "ERR_VALIDATION_MISSING_ARGUMENT");
      expect(error).toHaveProperty("argument", "VM");
      expect(error).toHaveProperty("fix", `Run 'xenops-cli ${command} --help' for usage.`);
      expect(client.calls).toHaveLength(0);
    });

    it("add without a file fails before any call to xenopsd", async () => {
      const error = await captureRejection(xenops.add(undefined));

      expect(error).toHaveProperty("code", "ERR_VALIDATION_MISSING_ARGUMENT");
      expect(error).toHaveProperty("message", "Missing required argument FILE");
      expect(client.calls).toHaveLength(0);
    });
  });

  describe("add", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "xenops-add-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("registers the file's contents", async () => {
      const path = join(dir, "vm.json");
      writeFileSync(path, '{"name":"builder"}');

      const result = await xenops.add(path);

      expect(result.path).toBe(path);
      expect(client.calls).toEqual([{ op: "register", args: ['{"name":"builder"}'] }]);
      expect(client.get(result.vmId)).toEqual({ id: result.vmId, name: "builder", powerState: "Halted" });
    });

    it("refuses a directory without contacting xenopsd", async () => {
      const error = await captureRejection(xenops.add(dir));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty("code", "ERR_VALIDATION_NOT_A_FILE");
      expect(error).toHaveProperty("message", `FILE: "${dir}" is a directory, not a file`);
      expect(client.calls).toHaveLength(0);
    });

    it("passes the daemon's rejection of bad metadata through", async () => {
      const path = join(dir, "vm.json");
      writeFileSync(path, "not json");

      const error = await captureRejection(xenops.add(path));

      expect(error).toBeInstanceOf(VmError);
      expect(error).toHaveProperty("code", "ERR_VM_INVALID_METADATA");
      expect(error).toHaveProperty("message", "VM metadata is not valid JSON");
    });

    it("reports a file that disappeared before it was read", async () => {
      const error = await captureRejection(xenops.add(join(dir, "gone.json")));

      expect(error).toHaveProperty("code", "ERR_VALIDATION_FILE_NOT_FOUND");
      expect(client.calls).toHaveLength(0);
    });
  });

  describe("list", () => {
    it("returns VMs in the order xenopsd reports them", async () => {
      client = new MemoryXenopsClient([
        { id: "vm-b", name: "B", powerState: "Halted" },
        { id: "vm-a", name: "A", powerState: "Running" },
      ]);
      xenops = createXenops({ client, logger: createSilentLogger() });

      expect(await xenops.list()).toEqual([
        { id: "vm-b", name: "B", powerState: "Halted" },
        { id: "vm-a", name: "A", powerState: "Running" },
      ]);
    });
  });

  describe("remove", () => {
    it("unregisters a Halted VM by id without resolving", async () => {
      expect(await xenops.remove({ kind: "id", id: DB })).toEqual({ vmId: DB });
      expect(client.calls).toEqual([{ op: "unregister", args: [DB] }]);
      expect(client.get(DB)).toBeUndefined();
    });

    it("passes a power-state conflict through unchanged", async () => {
      const error = await captureRejection(xenops.remove({ kind: "id", id: WEB }));

      expect(error).toBeInstanceOf(PowerStateConflictError);
      expect(error).toHaveProperty("code", "ERR_VM_POWER_STATE_CONFLICT");
      expect(error).toHaveProperty(
        "message",
        `VM ${WEB} is Running; only Halted VMs may be unregistered`,
      );
      expect(error).toHaveProperty("currentState", "Running");
      expect(client.get(WEB)?.powerState).toBe("Running");
    });

    it("reports the same NotFound every time for an unregistered VM", async () => {
      const missing = "6f1c0c52-4a8e-4d0b-9d7e-0c8f6e2b1aff";

      const first = await captureRejection(xenops.remove({ kind: "id", id: missing }));
      const second = await captureRejection(xenops.remove({ kind: "id", id: missing }));

      expect(first).toHaveProperty("code", "ERR_VM_NOT_FOUND");
      expect(second).toHaveProperty("code", "ERR_VM_NOT_FOUND");
      expect(second).toHaveProperty("message", `VM ${missing} is not registered`);
      expect(first).toHaveProperty("message", `VM ${missing} is not registered`);
    });

    it("reports the same NotFound twice for a name that is gone", async () => {
      await xenops.remove({ kind: "name", name: "db" });

      const first = await captureRejection(xenops.remove({ kind: "name", name: "db" }));
      const second = await captureRejection(xenops.remove({ kind: "name", name: "db" }));

      expect(first).toHaveProperty("message", "VM not found: db");
      expect(second).toHaveProperty("message", "VM not found: db");
    });
  });

  describe("start", () => {
    it("asks for a Paused VM when --paused is set", async () => {
      const result = await xenops.start({ kind: "id", id: DB }, { paused: true });

      expect(client.transitions).toEqual([{ vmId: DB, action: "start", paused: true }]);
      expect(result).toEqual({ vmId: DB, action: "start", powerState: "Paused" });
    });

    it("asks for a Running VM otherwise", async () => {
      const result = await xenops.start({ kind: "id", id: DB });

      expect(client.transitions).toEqual([{ vmId: DB, action: "start", paused: false }]);
      expect(result.powerState).toBe("Running");
    });

    it("surfaces the daemon's conflict when the VM already runs", async () => {
      const error = await captureRejection(xenops.start({ kind: "id", id: WEB }));

      expect(error).toHaveProperty("code", "ERR_VM_POWER_STATE_CONFLICT");
      expect(error).toHaveProperty("message", `Cannot start VM ${WEB} while it is Running`);
      expect(client.transitions).toHaveLength(1);
    });
  });

  describe("shutdown and reboot", () => {
    it("sends exactly one shutdown request carrying the timeout", async () => {
      const result = await xenops.shutdown({ kind: "id", id: WEB }, { timeout: 30 });

      expect(client.calls).toHaveLength(1);
      expect(client.transitions).toEqual([{ vmId: WEB, action: "shutdown", timeout: 30 }]);
      expect(result.powerState).toBe("Halted");
    });

    it("leaves the timeout out when none is given", async () => {
      await xenops.shutdown({ kind: "id", id: WEB });

      expect(client.transitions).toHaveLength(1);
      expect(client.transitions[0]).not.toHaveProperty("timeout");
      expect(client.transitions[0]).toEqual({ vmId: WEB, action: "shutdown" });
    });

    it("never follows a failed shutdown with a second request", async () => {
      const error = await captureRejection(xenops.shutdown({ kind: "id", id: DB }, { timeout: 5 }));

      expect(error).toHaveProperty("code", "ERR_VM_POWER_STATE_CONFLICT");
      expect(client.transitions).toEqual([{ vmId: DB, action: "shutdown", timeout: 5 }]);
    });

    it("reboots with the same policy", async () => {
      const result = await xenops.reboot({ kind: "id", id: BATCH }, { timeout: 12.5 });

      expect(client.transitions).toEqual([{ vmId: BATCH, action: "reboot", timeout: 12.5 }]);
      expect(result.powerState).toBe("Running");
    });
  });

  describe("suspend", () => {
    it("passes the block device through", async () => {
      await xenops.suspend({ kind: "id", id: WEB }, { blockDevice: "/dev/xvdb" });

      expect(client.transitions).toEqual([
        { vmId: WEB, action: "suspend", blockDevice: "/dev/xvdb" },
      ]);
    });

    it("lets xenopsd choose the suspend target when none is given", async () => {
      await xenops.suspend({ kind: "id", id: WEB });

      expect(client.transitions[0]).not.toHaveProperty("blockDevice");
    });
  });

  describe("reference resolution", () => {
    it("resolves a name with one enumerate call, then targets its id", async () => {
      await xenops.shutdown({ kind: "name", name: "web" }, { timeout: 30 });

      expect(client.calls.map((call) => call.op)).toEqual(["enumerate", "requestPowerTransition"]);
      expect(client.transitions).toEqual([{ vmId: WEB, action: "shutdown", timeout: 30 }]);
    });

    it("fails on a name shared by two VMs and issues no transition", async () => {
      client = new MemoryXenopsClient([
        { id: "vm-1", name: "twin", powerState: "Running" },
        { id: "vm-2", name: "twin", powerState: "Running" },
      ]);
      xenops = createXenops({ client, logger: createSilentLogger() });

      const error = await captureRejection(xenops.reboot({ kind: "name", name: "twin" }));

      expect(error).toHaveProperty("code", "ERR_VM_AMBIGUOUS_REFERENCE");
      expect(client.transitions).toHaveLength(0);
    });

    it("fails on an unknown name and issues no transition", async () => {
      const error = await captureRejection(xenops.start({ kind: "name", name: "nope" }));

      expect(error).toHaveProperty("code", "ERR_VM_NOT_FOUND");
      expect(client.transitions).toHaveLength(0);
    });
  });

  it("fires vm:beforeTransition once per request", async () => {
    const seen: TransitionRequest[] = [];
    xenops.hooks.hook("vm:beforeTransition", (request) => {
      seen.push(request);
    });

    await xenops.start({ kind: "id", id: DB }, { paused: true });

    expect(seen).toEqual([{ vmId: DB, action: "start", paused: true }]);
  });

  it("traces resolution and requests through the injected logger", async () => {
    const lines: string[] = [];
    xenops = createXenops({ client, logger: recordingLogger(lines) });

    await xenops.reboot({ kind: "name", name: "web" });

    expect(lines).toEqual([`Resolved "web" to ${WEB}`, `[rpc] Requesting reboot of ${WEB}`]);
  });
});
