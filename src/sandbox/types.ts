export interface SandboxHandle {
  /**
   * Absolute path of the isolated runtime directory.
   */
  root: string
  /**
   * Version of the base interpreter the sandbox was built from, e.g. "3.11.4".
   */
  runtimeVersion: string
  baseInterpreter: string
}

/**
 * Creates isolated language runtimes. `create` fails with SandboxCreationError
 * on an unmet version constraint, a permission problem or a full disk, and
 * leaves nothing behind when it fails.
 */
export interface Sandbox {
  create(root: string, versionConstraint: string): Promise<SandboxHandle>
  resolveRuntimeExecutable(handle: SandboxHandle): string
}
