import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { parseVmReference } from "../lib/vm-ref.ts";
import { describeTransition } from "../lib/render.ts";
import { globalArgs, vmArg } from "./args.ts";
import { parseExistingFileArg } from "./input.ts";
import { failCommand, setupCommand } from "./shared.ts";

const suspendCommand = defineCommand({
  meta: {
    name: "suspend",
    description: "Suspend a VM, saving its memory image to a block device",
  },
  args: {
    ...globalArgs,
    vm: vmArg("suspended"),
    "block-device": {
      type: "string",
      valueHint: "path",
      description: "Block device to write the suspend image to (default: chosen by xenopsd)",
    },
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("suspend", args);

    try {
      const ref = parseVmReference(args.vm);
      const blockDevice = parseExistingFileArg("--block-device", args["block-device"]);
      cmdLog.set({ vm: args.vm, blockDevice: blockDevice ?? null });

      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.suspend(ref, { blockDevice });

      consola.success(describeTransition(result));
      cmdLog.set({ vmId: result.vmId, powerState: result.powerState });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default suspendCommand;
