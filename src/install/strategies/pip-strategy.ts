import { BaseInstallStrategy, BackendCommand, InstallRequest } from './base.js'

/**
 * pip from inside the sandbox, so nothing lands in the base interpreter.
 */
export class PipInstallStrategy extends BaseInstallStrategy {
  readonly name = 'pip' as const
  readonly executable = 'pip'

  protected versionCommand(request: Pick<InstallRequest, 'runtimeExecutable'>): BackendCommand {
    return { command: request.runtimeExecutable, args: ['-m', 'pip', '--version'] }
  }

  protected buildCommand(request: InstallRequest): BackendCommand {
    return {
      command: request.runtimeExecutable,
      args: ['-m', 'pip', 'install', '--disable-pip-version-check', ...request.packages],
      opts: { cwd: request.projectPath },
    }
  }
}
