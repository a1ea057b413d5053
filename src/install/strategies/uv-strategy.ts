import { BaseInstallStrategy, BackendCommand, InstallRequest } from './base.js'

export class UvInstallStrategy extends BaseInstallStrategy {
  readonly name = 'uv' as const
  readonly executable = 'uv'

  protected buildCommand(request: InstallRequest): BackendCommand {
    return {
      command: this.executable,
      args: ['pip', 'install', '--python', request.runtimeExecutable, ...request.packages],
      opts: { cwd: request.projectPath },
    }
  }
}
