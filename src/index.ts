export {
	DEFAULT_SETTINGS,
	loadConfig,
	validateJobs,
	validateSettings,
	type ConfigOverrides,
	type LoadConfigOptions,
	type MirrorConfig,
	type MirrorJob,
	type MirrorSettings,
} from "#config";
export {
	createMetadataResolver,
	METADATA_PREFIX,
	resolveSecretValue,
	type SecretResolver,
} from "#config/secrets";
export { GitCommandError } from "#core/errors";
export { createLogger, type Logger, type LogLevel } from "#core/logger";
export { getJobLayout, type JobLayout } from "#core/paths";
export {
	createGitClient,
	type GitCallOptions,
	type GitClient,
	type PushMode,
} from "#git/git-client";
export { redactEndpoints, redactRepoUrl } from "#git/redact";
export {
	detectChanges,
	type PushDecision,
	type SyncSnapshot,
} from "#mirror/change-detector";
export {
	createMirrorEngine,
	type IterationResult,
	type MirrorEngine,
	type MirrorPhase,
} from "#mirror/mirror-engine";
export { createRateLimiter, type RateLimiter } from "#mirror/rate-limiter";
export {
	createStatusTracker,
	type StatusPayload,
	type StatusRecord,
	type StatusTracker,
} from "#mirror/status-tracker";
export {
	createSupervisor,
	type SupervisedJob,
	type Supervisor,
} from "#mirror/supervisor";
export { createStatusApp } from "#server/app";
export {
	evaluateHealth,
	type HealthReport,
	renderStatusReport,
} from "#server/status-report";
export { startStatusServer } from "#server/serve";
