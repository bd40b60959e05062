import { Command } from "commander";

import { appLogger, normalizeError } from "../observability/logger.js";
import { isValidationError, SourceError } from "../settings/errors.js";
import { present } from "../settings/optional.js";
import { settingsFragment, settingsToString, type SettingsFragment } from "../settings/settings.js";
import { vpnFragment } from "../settings/vpn.js";
import { loadSettings, type LoadSettingsOptions } from "../sources/index.js";
import type { Environment } from "../sources/env.js";
import { processOutput, type Output } from "./output.js";

const logger = appLogger.child({ component: "cli" });

type SourceFlags = {
  config?: string;
  secretsDir?: string;
  wireguardConf?: string;
  vpnType?: string;
  provider?: string;
};

export type CliContext = {
  output?: Output;
  env?: Environment;
};

function overridesFrom(flags: SourceFlags): SettingsFragment[] {
  if (flags.vpnType === undefined && flags.provider === undefined) {
    return [];
  }
  return [
    settingsFragment({
      vpn: vpnFragment({
        ...(flags.vpnType !== undefined ? { type: present(flags.vpnType) } : {}),
        ...(flags.provider !== undefined ? { provider: present(flags.provider.toLowerCase()) } : {}),
      }),
    }),
  ];
}

function loadOptions(flags: SourceFlags, env: Environment | undefined): LoadSettingsOptions {
  return {
    env,
    yamlPath: flags.config,
    secretsDir: flags.secretsDir,
    wireguardConfPath: flags.wireguardConf,
    overrides: overridesFrom(flags),
  };
}

function withSourceOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "YAML settings file")
    .option("--secrets-dir <path>", "directory holding secret files")
    .option("--wireguard-conf <path>", "WireGuard configuration file")
    .option("--vpn-type <type>", "force the VPN protocol (openvpn or wireguard)")
    .option("--provider <name>", "force the VPN service provider");
}

function reportFailure(output: Output, error: unknown): void {
  if (isValidationError(error)) {
    output.printErrorLine("settings are not valid:", error.message);
    return;
  }
  if (error instanceof SourceError) {
    output.printErrorLine(`reading ${error.source} failed:`, error.message);
    return;
  }
  logger.error({ event: "cli.failed", err: normalizeError(error) }, "unexpected failure");
  output.printErrorLine("unexpected error:", error);
}

/** Builds the command tree; the resulting exit code is reported through `setExitCode`. */
export function createProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const output = context.output ?? processOutput;
  const program = new Command();

  program.name("tunnelconf").description("Resolve, validate and print VPN client settings");

  withSourceOptions(program.command("show"))
    .description("print the resolved settings with secrets redacted")
    .action(async (flags: SourceFlags) => {
      try {
        const settings = await loadSettings(loadOptions(flags, context.env));
        output.printLine(settingsToString(settings));
        setExitCode(0);
      } catch (error) {
        reportFailure(output, error);
        setExitCode(1);
      }
    });

  withSourceOptions(program.command("validate"))
    .description("check the settings and exit non-zero when they are not valid")
    .action(async (flags: SourceFlags) => {
      try {
        await loadSettings(loadOptions(flags, context.env));
        output.printLine("settings are valid");
        setExitCode(0);
      } catch (error) {
        reportFailure(output, error);
        setExitCode(1);
      }
    });

  return program;
}

/** Runs the command line with user arguments only (no node or script path). */
export async function runCli(args: readonly string[], context: CliContext = {}): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, code => {
    exitCode = code;
  });
  await program.parseAsync([...args], { from: "user" });
  return exitCode;
}
