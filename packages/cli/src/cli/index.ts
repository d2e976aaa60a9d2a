import { defineCommand, runMain } from "citty";

import { generateCommand } from "./commands/generate";
import { initCommand } from "./commands/init";
import { validateCommand } from "./commands/validate";

const main = defineCommand({
  meta: {
    name: "sdkloom",
    version: "0.1.0",
    description: "Compile OpenAPI documents into an IR and client models",
  },
  subCommands: {
    init: initCommand,
    generate: generateCommand,
    validate: validateCommand,
  },
});

export function run() {
  return runMain(main);
}
