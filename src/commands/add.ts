import { defineCommand } from "citty";
import { consola } from "consola";
import { createXenops } from "../context.ts";
import { globalArgs } from "./args.ts";
import { parseExistingFileArg } from "./input.ts";
import { failCommand, setupCommand } from "./shared.ts";

const addCommand = defineCommand({
  meta: {
    name: "add",
    description: "Register a new VM with xenopsd",
  },
  args: {
    ...globalArgs,
    file: {
      type: "positional",
      required: false,
      valueHint: "FILE",
      description: "Path to the VM metadata to be registered",
    },
  },
  async run({ args }) {
    const { options, cmdLog } = setupCommand("add", args);

    try {
      const path = parseExistingFileArg("FILE", args.file);
      const xenops = createXenops({ socketPath: options.socketPath });
      const result = await xenops.add(path);

      consola.success(`Registered VM ${result.vmId}`);
      cmdLog.set({ path: result.path, vmId: result.vmId });
      cmdLog.emit();
    } catch (error) {
      failCommand(error, cmdLog);
    }
  },
});

export default addCommand;
