import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

const execFileAsync = promisify(execFile)

export interface CommandOutput {
  stdout: string
  stderr: string
}

/**
 * Runs a binary with arguments and resolves with its output.
 * Rejects when the binary cannot be spawned or exits non-zero.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
) => Promise<CommandOutput>

const COMMAND_TIMEOUT_MS = 15000
const COMMAND_MAX_BUFFER = 4 * 1024 * 1024

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: 'utf8',
    timeout: COMMAND_TIMEOUT_MS,
    maxBuffer: COMMAND_MAX_BUFFER,
  })
  return { stdout, stderr }
}

/**
 * Thin wrapper over the docker CLI for one container.
 */
export class DockerContainer {
  constructor(
    readonly name: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  /** Fails when the docker binary is missing or the daemon is unreachable */
  async info(): Promise<void> {
    await this.run('docker', ['info', '--format', '{{.ServerVersion}}'])
  }

  /** The container's state, e.g. 'running' or 'exited' */
  async status(): Promise<string> {
    const { stdout } = await this.run('docker', [
      'container',
      'inspect',
      this.name,
      '--format',
      '{{.State.Status}}',
    ])
    return stdout.trim()
  }

  async exec(command: readonly string[]): Promise<string> {
    const { stdout } = await this.run('docker', ['exec', this.name, ...command])
    return stdout
  }
}

/**
 * Extracts a readable reason from a failed child process.
 */
export function describeCommandFailure(error: unknown): string {
  if (error && typeof error === 'object') {
    const stderr =
      'stderr' in error && typeof error.stderr === 'string'
        ? error.stderr.trim()
        : ''
    if (stderr) return stderr
    if ('code' in error && error.code === 'ENOENT') {
      return 'docker command not found'
    }
  }
  return error instanceof Error ? error.message : String(error)
}
