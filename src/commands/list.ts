import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { getOutputMode } from "../lib/logger/index.ts";
import { renderVmTable } from "../lib/render.ts";
import { globalArgs } from "./args.ts";
import { failCommand, setupCommand } from "./shared.ts";

const listCommand = defineCommand({
  meta: {
    name: "list",
    description: "List the VMs registered with xenopsd",
  },
  args: {
    ...globalArgs,
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("list", args);

    try {
      const xenops = createXenops({ socketPath: options.socketPath });
      const vms = await xenops.list();

      consola.debug(`xenopsd reported ${vms.length} VM(s)`);

      if (getOutputMode() === "json") {
        cmdLog.set({ count: vms.length, vms });
      } else {
        if (vms.length === 0) {
          consola.log("No VMs registered.");
        } else {
          consola.log(renderVmTable(vms));
        }
        cmdLog.set({ count: vms.length });
      }
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default listCommand;
