import { Command } from "commander";
import { logError } from "./utils/logger";
import { runBuildCommand } from "./commands/build";
import { runCleanCommand } from "./commands/clean";
import { EMBUNDLE_VERSION } from "@core/version";

interface BuildFlags {
  config?: string;
  outDir?: string;
  mode?: string;
  minifier?: string;
}

const program = new Command();

program
  .name("embundle")
  .description("Compile, link and embed module bundles")
  .version(EMBUNDLE_VERSION);

program
  .command("build")
  .description("Build every configured bundle and write it to the output directory")
  .option("-c, --config <file>", "Config file (default: embundle.config.*)")
  .option("-o, --out-dir <dir>", "Output directory")
  .option("-m, --mode <mode>", "development or production")
  .option("--minifier <name>", "esbuild, swc, none or auto")
  .action(async (options: BuildFlags) => {
    try {
      await runBuildCommand(options);
    } catch (err) {
      logError("Build failed", err);
      process.exit(1);
    }
  });

program
  .command("clean")
  .description("Remove the build cache")
  .option("-c, --config <file>", "Config file (default: embundle.config.*)")
  .action(async (options: { config?: string }) => {
    try {
      await runCleanCommand(options);
    } catch (err) {
      logError("Clean failed", err);
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logError("embundle failed", err);
  process.exit(1);
});
