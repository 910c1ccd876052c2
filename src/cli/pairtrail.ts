#!/usr/bin/env node

/**
 * pairtrail CLI
 *
 * Credits co-authors and normalizes issue references in git commit
 * messages, driven by a registry of developers and repositories.
 */

import { Command } from "commander";

import {
  registerAddDevCommand,
  registerAddInfoCommand,
  registerAddRepoCommand,
  registerInstallHooksCommand,
  registerShowCommand,
  registerUpdateRepoDevsCommand,
} from "@/cli/commands/pairtrailCommands.js";
import { setSilentMode } from "@/cli/logger.js";
import { getCurrentPackageVersion } from "@/cli/version.js";

import type { GlobalOptions } from "@/cli/commands/pairtrailCommands.js";

const program = new Command();
const version = getCurrentPackageVersion() || "unknown";

program
  .name("pairtrail")
  .version(version)
  .description(`pairtrail - co-author trailers for git commits v${version}`)
  .option(
    "-c, --config-dir <path>",
    "Directory holding .pairtrail.json (default: $PAIRTRAIL_CONFIG_DIR or ~)",
  )
  .option("-n, --non-interactive", "Run without interactive prompts")
  .option("-s, --silent", "Suppress all output (implies --non-interactive)")
  .hook("preAction", () => {
    const globalOpts = program.opts<GlobalOptions>();
    setSilentMode({ silent: globalOpts.silent ?? false });
  })
  .addHelpText(
    "after",
    `
Examples:
  $ pairtrail add-dev alice "Alice Example" alice@example.com
  $ pairtrail add-repo ~/work/api alice bob
  $ pairtrail add-repo ~/work alice          # also matches ~/work/<any repo>
  $ pairtrail update-repo-devs alice carol   # for the repo containing cwd
  $ pairtrail install-hooks ~/work/api
  $ pairtrail show

Commit message tags:
  [alice,bob] Fix login        credit alice and bob
  [1234|alice] Fix login       issue #1234, credit alice
`,
  );

registerAddDevCommand({ program });
registerAddRepoCommand({ program });
registerUpdateRepoDevsCommand({ program });
registerInstallHooksCommand({ program });
registerAddInfoCommand({ program });
registerShowCommand({ program });

// Show help if no command provided
if (process.argv.length < 3) {
  program.help();
}

await program.parseAsync(process.argv);
