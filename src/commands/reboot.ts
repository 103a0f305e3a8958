import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { parseVmReference } from "../lib/vm-ref.ts";
import { describeTransition } from "../lib/render.ts";
import { globalArgs, timeoutArgs, vmArg } from "./args.ts";
import { parseTimeoutArg } from "./input.ts";
import { failCommand, setupCommand } from "./shared.ts";

const rebootCommand = defineCommand({
  meta: {
    name: "reboot",
    description:
      "Reboot a VM. Shuts it down as 'shutdown' does, then powers it back on",
  },
  args: {
    ...globalArgs,
    vm: vmArg("rebooted"),
    ...timeoutArgs,
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("reboot", args);

    try {
      const ref = parseVmReference(args.vm);
      const timeout = parseTimeoutArg(args.timeout);
      cmdLog.set({ vm: args.vm, timeout: timeout ?? null });

      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.reboot(ref, { timeout });

      consola.success(describeTransition(result));
      cmdLog.set({ vmId: result.vmId, powerState: result.powerState });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default rebootCommand;
