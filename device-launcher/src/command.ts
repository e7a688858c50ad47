import type { LaunchConfig, SampleProgram } from './resolve.js';

export interface Invocation {
  command: string;
  args: string[];
}

// Flag order is fixed so identical input always yields an identical command line
export function buildCommandLine(config: LaunchConfig): string[] {
  return [
    `--project_id=${config.projectId}`,
    `--cloud_region=${config.region}`,
    `--registry_id=${config.registry}`,
    `--device_id=${config.deviceId}`,
    `--key_file=${config.keyFile}`,
    `--message_type=${config.messageType}`,
    `--algorithm=${config.algorithm}`,
  ];
}

export function buildInvocation(config: LaunchConfig, program: SampleProgram): Invocation {
  return { command: program.interpreter, args: [program.script, ...buildCommandLine(config)] };
}

// For logging only; arguments are passed to spawn unquoted
export function formatInvocation(inv: Invocation): string {
  return [inv.command, ...inv.args].map(quote).join(' ');
}

function quote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}
