import { spawn } from 'child_process';
import { CONFIG } from './config';
import { stripAnsi } from './patterns';
import { CommandResult } from './types';

export interface LogSource {
  fetchLogs(container: string, since: string, maxLines: number): Promise<string>;
  containerExists(name: string): Promise<boolean>;
  containerStartedAt(name: string): Promise<string>;
}

export interface DockerOptions {
  useSudo: boolean;
  verbose: boolean;
}

/**
 * Runs a docker subcommand and collects stdout and stderr into one string in
 * arrival order, keeping stdout alone as well. Resolves with a failure value
 * instead of rejecting, carrying whatever output was produced before the
 * process exited.
 */
export function runDocker(args: string[], opts: DockerOptions): Promise<CommandResult> {
  const cmd = opts.useSudo ? 'sudo' : 'docker';
  const spawnArgs = opts.useSudo ? ['docker', ...args] : args;
  if (opts.verbose) {
    // eslint-disable-next-line no-console
    console.log(`[DOCKER] ${cmd} ${spawnArgs.join(' ')}`);
  }
  return new Promise((resolve) => {
    let output = '';
    let stdout = '';
    let settled = false;
    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };
    const proc = spawn(cmd, spawnArgs);
    proc.stdout.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf8');
      output += text;
      stdout += text;
    });
    proc.stderr.on('data', (chunk: Buffer) => { output += chunk.toString('utf8'); });
    proc.on('error', (err: Error) => {
      finish({ kind: 'failed', reason: `spawn error: ${err.message}`, output, stdout });
    });
    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code === 0) {
        finish({ kind: 'ok', output, stdout });
      } else {
        finish({ kind: 'failed', reason: `exited code=${code} signal=${signal}`, output, stdout });
      }
    });
  });
}

export class DockerLogSource implements LogSource {
  constructor(private opts: DockerOptions = { useSudo: CONFIG.dockerUseSudo, verbose: CONFIG.verbose }) {}

  async fetchLogs(container: string, since: string, maxLines: number): Promise<string> {
    const args = ['logs', '--timestamps'];
    if (since) args.push('--since', since);
    args.push('--tail', String(maxLines), container);
    const result = await runDocker(args, this.opts);
    if (result.kind === 'failed') this.notice(`logs ${container}: ${result.reason}`);
    // Partial output is still usable; an empty string just means "no new data".
    return stripAnsi(result.output);
  }

  async containerExists(name: string): Promise<boolean> {
    const result = await runDocker(['ps', '-a', '--format', '{{.Names}}'], this.opts);
    if (result.kind === 'failed') {
      this.notice(`ps: ${result.reason}`);
      return false;
    }
    return result.stdout.split('\n').some((line) => line.trim() === name);
  }

  async containerStartedAt(name: string): Promise<string> {
    const result = await runDocker(['inspect', '-f', '{{.State.StartedAt}}', name], this.opts);
    if (result.kind === 'failed') {
      this.notice(`inspect ${name}: ${result.reason}`);
      return '';
    }
    const out = result.stdout.trim();
    const m = out.match(/^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})/);
    return m ? m[1] : out;
  }

  private notice(msg: string) {
    // eslint-disable-next-line no-console
    console.error(`[DOCKER] ${msg}`);
  }
}
