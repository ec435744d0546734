import { spawn } from 'child_process';
import { CommandError } from './errors';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

// Runs an external command and resolves with its output once it exits 0
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

export const splitCommand = (commandLine: string): { command: string; args: string[] } => {
  const [command = '', ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
};

export const runCommand: CommandRunner = (command, args) => {
  const display = [command, ...args].join(' ');

  return new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new CommandError(display, code, stderr));
      }
    });

    child.on('error', (error) => {
      reject(new CommandError(display, null, error.message, error));
    });
  });
};
