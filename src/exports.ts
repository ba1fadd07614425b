import { DeferredValue, DeploymentPlan, DerivedSettings, ExportValue } from './types';

// Read by the web app as environment variables; renaming a key breaks it.
export const EXPORT_KEYS = [
  'AZURE_LOCATION',
  'AZURE_RESOURCE_GROUP',
  'AZURE_SUBSCRIPTION_ID',
  'AZURE_TENANT_ID',
  'AZURE_AI_SETUP',
  'AZURE_AI_SERVICES_NAME',
  'AZURE_AI_SERVICES_ID',
  'AZURE_INFERENCE_ENDPOINT',
  'AZURE_INFERENCE_CREDENTIAL',
  'AZURE_AI_CHAT_DEPLOYMENT_NAME',
  'AZURE_AI_AUDIO_DEPLOYMENT_NAME',
  'AZURE_CLIENT_ID',
  'SERVICE_WEB_NAME',
  'SERVICE_WEB_URI',
  'SERVICE_WEB_IDENTITY_PRINCIPAL_ID',
  'AZURE_STORAGE_ACCOUNT_NAME',
  'ENABLE_KEY_VAULT',
  'AZURE_KEY_VAULT_NAME',
  'AZURE_SEARCH_ENDPOINT',
  'AZURE_SEARCH_SERVICE_NAME',
  'APPLICATIONINSIGHTS_CONNECTION_STRING',
  'ENABLE_AZURE_MONITOR_TRACING',
  'AZURE_TRACING_GEN_AI_CONTENT_RECORDING_ENABLED',
  'AZURE_AI_DEPLOYMENT_WARNING',
] as const;

export type ExportKey = (typeof EXPORT_KEYS)[number];

export type ExportedConfig = Record<ExportKey, ExportValue>;

/** Value the web app checks to pick managed identity authentication. */
export const MANAGED_IDENTITY_CLIENT_ID = 'system-assigned-managed-identity';

export const WARNING_SEPARATOR = ' | ';

export const isDeferred = (value: ExportValue): value is DeferredValue =>
  typeof value === 'object' && value !== null && 'deferred' in value;

const deploymentNames = (plan: DeploymentPlan, derived: DerivedSettings) => {
  const { chat, audio } = derived.requestedModels;
  switch (plan.ai.status) {
    case 'provisioned': {
      const deployed = new Set(plan.ai.deployments.map((deployment) => deployment.name));
      return {
        chat: deployed.has(chat.name) ? chat.name : '',
        audio: audio && deployed.has(audio.name) ? audio.name : '',
      };
    }
    case 'referenced':
      return { chat: chat.name, audio: audio?.name ?? '' };
    case 'broken-reference':
      return { chat: '', audio: '' };
  }
};

export const buildExports = (
  plan: DeploymentPlan,
  derived: DerivedSettings,
): ExportedConfig => {
  const { context, flags } = derived;
  const models = deploymentNames(plan, derived);
  const [aiKeySecret] = plan.secrets;

  return {
    AZURE_LOCATION: context.location,
    AZURE_RESOURCE_GROUP: context.resourceGroupName,
    AZURE_SUBSCRIPTION_ID: context.subscriptionId,
    AZURE_TENANT_ID: context.tenantId,
    AZURE_AI_SETUP: plan.setup,
    AZURE_AI_SERVICES_NAME: plan.ai.reference?.name ?? '',
    AZURE_AI_SERVICES_ID: plan.ai.reference?.id ?? '',
    AZURE_INFERENCE_ENDPOINT: plan.ai.reference?.endpoint ?? '',
    // Only ever a Key Vault reference, never the key itself.
    AZURE_INFERENCE_CREDENTIAL: aiKeySecret?.reference ?? '',
    AZURE_AI_CHAT_DEPLOYMENT_NAME: models.chat,
    AZURE_AI_AUDIO_DEPLOYMENT_NAME: models.audio,
    AZURE_CLIENT_ID: plan.compute.systemAssignedIdentity ? MANAGED_IDENTITY_CLIENT_ID : '',
    SERVICE_WEB_NAME: plan.compute.app.name,
    SERVICE_WEB_URI: plan.compute.app.endpoint,
    SERVICE_WEB_IDENTITY_PRINCIPAL_ID: plan.compute.systemAssignedIdentity
      ? { deferred: 'webIdentityPrincipalId' }
      : '',
    AZURE_STORAGE_ACCOUNT_NAME: plan.storage.name,
    ENABLE_KEY_VAULT: plan.keyVault !== undefined,
    AZURE_KEY_VAULT_NAME: plan.keyVault?.name ?? '',
    AZURE_SEARCH_ENDPOINT: plan.search?.endpoint ?? '',
    AZURE_SEARCH_SERVICE_NAME: plan.search?.name ?? '',
    APPLICATIONINSIGHTS_CONNECTION_STRING: plan.monitoring
      ? { deferred: 'appInsightsConnectionString' }
      : '',
    ENABLE_AZURE_MONITOR_TRACING: flags.tracing,
    AZURE_TRACING_GEN_AI_CONTENT_RECORDING_ENABLED: flags.contentRecording,
    AZURE_AI_DEPLOYMENT_WARNING: plan.warnings.join(WARNING_SEPARATOR),
  };
};
