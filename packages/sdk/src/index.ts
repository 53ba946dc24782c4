import type { MetaguardSdkContext, MetaguardSdkDependencies } from "./context.js";
import { createMetadataModule } from "./metadata/index.js";
import type { MetadataModule } from "./metadata/index.js";
import { createEntityResolvers } from "./resolvers/index.js";
import type { EntityResolvers } from "./resolvers/index.js";
import { createSdkTelemetryContext, type MetaguardSdkTelemetryOptions } from "./shared/telemetry.js";

/**
 * Public surface of the metaguard SDK: per-entity metadata resolvers plus partition-generic
 * reads and writes, all sharing the same dependencies.
 */
export interface MetaguardSdk {
  readonly resolvers: EntityResolvers;
  readonly metadata: MetadataModule;
}

export interface MetaguardSdkOptions {
  readonly telemetry?: MetaguardSdkTelemetryOptions;
}

/**
 * Creates an SDK instance backed by the provided dependencies.
 */
export const createMetaguardSdk = (
  deps: MetaguardSdkDependencies,
  options: MetaguardSdkOptions = {},
): MetaguardSdk => {
  const telemetry = createSdkTelemetryContext(options.telemetry);
  const context: MetaguardSdkContext = { deps, telemetry, logger: telemetry.logger };

  return {
    resolvers: createEntityResolvers(context),
    metadata: createMetadataModule(context),
  } satisfies MetaguardSdk;
};

export type { MetaguardSdkContext, MetaguardSdkDependencies } from "./context.js";
export type {
  DeleteMetadataInput,
  MetadataModule,
  ReadPartitionInput,
  UpdateMetadataInput,
} from "./metadata/index.js";
export type {
  EntityLocator,
  EntityMetadataResolver,
  EntityResolvers,
  MetadataReadResult,
  ReadMetadataInput,
} from "./resolvers/index.js";
export type {
  MetaguardSdkTelemetryContext,
  MetaguardSdkTelemetryMetrics,
  MetaguardSdkTelemetryOptions,
} from "./shared/telemetry.js";
export { createNotFoundError, createPermissionDeniedError, createValidationError } from "./shared/errors.js";
export {
  entityReferenceSchema,
  metadataItemSchema,
  partitionSchema,
  permissionSchema,
  requesterSchema,
} from "./shared/schemas.js";
