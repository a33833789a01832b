export { ExecutionEngine } from './execution-engine';
export { createCodeExecutionTool, codeExecutionSchema } from './code-execution-tool';
export type { CodeExecutionInput, CodeExecutionResult } from './code-execution-tool';
export { DockerExecutionHost } from './docker-host';
export type { DockerHostOptions } from './docker-host';
export { ContainerManager, parseMemory } from './container-manager';
export type { ContainerConfig, ContainerLimits } from './container-manager';
export {
  EngineConfigSchema,
  DockerHostConfigSchema,
  loadConfigFromEnv,
  loadDockerHostConfigFromEnv,
  parseEngineConfig,
  parseDockerHostConfig
} from './config';
export type { EngineConfig, EngineConfigInput, DockerHostConfig, DockerHostConfigInput } from './config';
export { checkCode } from './policy-gate';
export { extractDependencies } from './dependency-extractor';
export { DependencyManager, createWhitelist } from './dependency-manager';
export type { DependencyManagerOptions } from './dependency-manager';
export { InstallPolicyRegistry, BaseInstallPolicy, PipInstallPolicy, UvInstallPolicy } from './install-policies';
export type { InstallPolicy } from './install-policies';
export { CommandExecutor } from './command-executor';
export { Session } from './session';
export type { SessionRuntime } from './session';
export { SessionManager } from './session-manager';
export { Logger } from './logger';
export type { Verbosity } from './logger';
export {
  SandboxError,
  CommandTimeoutError,
  HostCommandError,
  SessionNotFoundError,
  SessionExistsError,
  PathSafetyError,
  ConfigurationError
} from './errors';
export type {
  ExecutionHost,
  RawCommandOutput,
  CommandResult,
  SafetyVerdict,
  DependencyWhitelist,
  InstallOutcome,
  ExecuteOptions,
  SessionInfo,
  WorkspaceFile
} from './types';
