export { createDataPlaneClient, DataPlaneClient } from './dataplane/client';
export type { BundleRef, BundleResult, BundleSnapshot, ClientOptions } from './dataplane/client';

export { planCreate, planDelete, planUpdate, readExistingChildren, runSteps, validateBundle } from './dataplane/bundle';
export type { BundleStep, ExistingChildren, ResourceBundle, ValidatedBundle } from './dataplane/bundle';

export { classifyError, isAbsentError, isRetryableError, matchRetryRule, RETRY_RULES } from './dataplane/classifier';
export type { ErrorClass, RetryRule } from './dataplane/classifier';

export { API_VERSIONS, decodeCollection, decodeEntity, shapeForVersion } from './dataplane/decoder';
export type { ApiVersion, JsonObject, ResponseShape } from './dataplane/decoder';

export * from './dataplane/errors';
export * from './dataplane/models';

export { DEFAULT_RETRY_POLICY, RetryOrchestrator, sleep } from './dataplane/orchestrator';
export type { AttemptResult, RetryPolicy, Sleep } from './dataplane/orchestrator';

export { parentScope, ROOT, sectionScope } from './dataplane/paths';
export type { ParentType, ScopeRef, ScopeSpec } from './dataplane/paths';

export { createEntityOperations, descriptors, ResourceOperations } from './dataplane/resources';
export type { EntityOperations, KeyKind, ResourceDescriptor, ResourceKind } from './dataplane/resources';

export { TransactionEnvelope } from './dataplane/transaction';
export type { Transaction, TransactionWork } from './dataplane/transaction';

export { Transport } from './dataplane/transport';
export type { TransportOptions, TransportResponse, TransportSettings } from './dataplane/transport';

export { applyEnvOverrides, CONFIG_DIRECTORY, getDefaultConfigFile, loadConfigFile, parseConfig } from './config';
export { DataPlaneConfigSchema } from './types/config';
export type { DataPlaneConfig, DataPlaneConfigInput } from './types/config';

export { redactSensitive } from './logging/redact';
export { zone } from './logging/zone';
