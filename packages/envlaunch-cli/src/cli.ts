import { Command } from "commander";
import { readPackageInfo } from "./lib/version.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerLaunchCommand } from "./modules/launch.js";

export async function main(argv = process.argv): Promise<void> {
  try {
    const pkg = readPackageInfo();
    const program = new Command()
      .name("envlaunch")
      .description("Open the first http: URL found in a local file")
      .version(pkg.version);

    registerLaunchCommand(program);

    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error, "plain");
    process.exitCode = 1;
  }
}
