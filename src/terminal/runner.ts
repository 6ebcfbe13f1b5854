/**
 * Shell command execution inside the fixed workspace directory.
 */
import { spawn, type ChildProcess } from 'node:child_process';
import { mkdir } from 'node:fs/promises';
import { componentLogger } from '../logger.js';

const log = componentLogger('terminal');

const DEFAULT_TIMEOUT_MS = 60_000;

const GROUP_KILL = process.platform !== 'win32';

/**
 * Kill the child and, on POSIX, every process in its group.
 */
function killTree(child: ChildProcess): void {
  if (GROUP_KILL && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (error) {
      log.debug({ pid: child.pid, err: error }, 'Process group already gone, killing child only');
    }
  }
  child.kill('SIGKILL');
}

export interface CommandRunnerOptions {
  workspaceDir: string;
  timeoutMs?: number;
  /** Shell binary; defaults to the platform shell */
  shell?: string;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
}

export class CommandRunner {
  readonly workspaceDir: string;
  private readonly timeoutMs: number;
  private readonly shell: string | boolean;

  constructor(options: CommandRunnerOptions) {
    this.workspaceDir = options.workspaceDir;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.shell = options.shell ?? true;
  }

  async ensureWorkspace(): Promise<void> {
    await mkdir(this.workspaceDir, { recursive: true });
  }

  /**
   * Run `command` and return stdout, or stderr when stdout is empty.
   * Rejects only when the process cannot be started.
   */
  async run(command: string): Promise<string> {
    const output = await this.execute(command);
    const text = output.stdout || output.stderr;
    return output.timedOut ? `${text}\n[timed out after ${this.timeoutMs}ms]` : text;
  }

  execute(command: string): Promise<CommandOutput> {
    log.debug({ command, cwd: this.workspaceDir }, 'Running command');

    return new Promise<CommandOutput>((resolve, reject) => {
      // Own process group on POSIX, so a timeout can kill whatever the shell started
      const child = spawn(command, { cwd: this.workspaceDir, shell: this.shell, detached: GROUP_KILL });

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      // Decode across chunk boundaries so multibyte characters survive
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      const timer = setTimeout(() => {
        timedOut = true;
        killTree(child);
      }, this.timeoutMs);

      child.on('close', (code) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.debug({ command, exitCode: code, timedOut }, 'Command finished');
        resolve({ stdout, stderr, exitCode: code, timedOut });
      });

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.warn({ command, err: error }, 'Command failed to start');
        reject(error);
      });
    });
  }
}
