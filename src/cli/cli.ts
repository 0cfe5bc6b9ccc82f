/**
 * CLI configuration
 */

import { Command } from "commander";
import { createDeployCommand } from "./commands/deploy.js";
import { createStatusCommand } from "./commands/status.js";
import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";

/**
 * Get package version from the nearest package.json (src/cli or the bundled dist/bin)
 */
export function getVersion(startDir: string = __dirname): string {
  let current = startDir;

  while (true) {
    const packageJsonPath = join(current, "package.json");
    if (existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
      return "0.0.0";
    }

    const parent = dirname(current);
    if (parent === current) {
      return "0.0.0";
    }
    current = parent;
  }
}

/**
 * Create CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("cfn-site-deploy")
    .description("Certificate, CloudFormation stack and content deployment for a static site on AWS")
    .version(getVersion());

  // Add commands
  program.addCommand(createDeployCommand());
  program.addCommand(createStatusCommand());

  return program;
}
