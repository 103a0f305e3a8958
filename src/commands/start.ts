import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { parseVmReference } from "../lib/vm-ref.ts";
import { describeTransition } from "../lib/render.ts";
import { globalArgs, vmArg } from "./args.ts";
import { failCommand, setupCommand } from "./shared.ts";

const startCommand = defineCommand({
  meta: {
    name: "start",
    description: "Start a VM and wait until it is Running (or Paused with --paused)",
  },
  args: {
    ...globalArgs,
    vm: vmArg("started"),
    paused: {
      type: "boolean",
      default: false,
      description: "Leave the VM in a Paused state",
    },
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("start", args);

    try {
      const ref = parseVmReference(args.vm);
      const paused = args.paused === true;
      cmdLog.set({ vm: args.vm, paused });

      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.start(ref, { paused });

      consola.success(describeTransition(result));
      cmdLog.set({ vmId: result.vmId, powerState: result.powerState });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default startCommand;
