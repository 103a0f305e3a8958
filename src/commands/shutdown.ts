import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { parseVmReference } from "../lib/vm-ref.ts";
import { describeTransition } from "../lib/render.ts";
import { globalArgs, timeoutArgs, vmArg } from "./args.ts";
import { parseTimeoutArg } from "./input.ts";
import { failCommand, setupCommand } from "./shared.ts";

const shutdownCommand = defineCommand({
  meta: {
    name: "shutdown",
    description:
      "Shutdown a VM. With --timeout the VM gets that long to shut down cleanly; otherwise, or once the timeout expires, it is powered off",
  },
  args: {
    ...globalArgs,
    vm: vmArg("shutdown and powered off"),
    ...timeoutArgs,
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("shutdown", args);

    try {
      const ref = parseVmReference(args.vm);
      const timeout = parseTimeoutArg(args.timeout);
      cmdLog.set({ vm: args.vm, timeout: timeout ?? null });

      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.shutdown(ref, { timeout });

      consola.success(describeTransition(result));
      cmdLog.set({ vmId: result.vmId, powerState: result.powerState });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default shutdownCommand;
