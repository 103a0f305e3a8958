import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { parseVmReference } from "../lib/vm-ref.ts";
import { globalArgs, vmArg } from "./args.ts";
import { failCommand, setupCommand } from "./shared.ts";

const removeCommand = defineCommand({
  meta: {
    name: "remove",
    description: "Unregister a VM (only Halted VMs may be unregistered)",
  },
  args: {
    ...globalArgs,
    vm: vmArg("unregistered"),
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("remove", args);

    try {
      const ref = parseVmReference(args.vm);
      cmdLog.set({ vm: args.vm });

      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.remove(ref);

      consola.success(`Unregistered VM ${result.vmId}`);
      cmdLog.set({ vmId: result.vmId });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default removeCommand;
