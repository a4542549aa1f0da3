/**
 * @promptdeck/cli
 *
 * Programmatic access to the services behind the promptdeck command.
 */

export { createProgram, registerCommands } from './program.js';

export {
  publishPackages,
  determineTag,
  defaultCommandRunner,
  MissingCredentialError,
  PublishError,
  PackageManifestSchema,
  NPM_TOKEN_CHILD_ENV,
  type CommandRunner,
  type CommandRunOptions,
  type PackageManifest,
  type PublishOptions,
  type PublishDeps,
  type PublishResult,
} from './services/publisher.js';

export {
  generatePublishWorkflow,
  checkWorkflowSync,
  DEFAULT_WORKFLOW_PATH,
  DEFAULT_REGISTRY_URL,
  type PublishWorkflowOptions,
} from './services/workflow.js';

export {
  loadProjectConfig,
  loadConfigWithErrors,
  findConfigPath,
  ConfigLoadError,
  type LoadedProjectConfig,
} from './utils/config-loader.js';

export { parseParams } from './commands/prompts.js';
