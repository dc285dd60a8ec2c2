/**
 * Version command - display version information.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { errorMessage } from "@chatmem/sdk";
import type { CliCommand, ParsedArgs } from "./base.js";

const PackageJsonSchema = z.object({ version: z.string().min(1) });

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  async execute(args: ParsedArgs): Promise<number> {
    try {
      const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
      const pkg = PackageJsonSchema.parse(raw);

      console.log(`chatmem v${pkg.version}`);

      if (args.flags.verbose) {
        console.log(`Node.js ${process.version}`);
        console.log(`Platform: ${process.platform} ${process.arch}`);
      }

      return 0;
    } catch (err) {
      console.error(`Failed to read version information: ${errorMessage(err)}`);
      return 1;
    }
  }
}
