import { DeploymentParameters } from './parameters';
import {
  AiReference,
  DeploymentContext,
  DerivedSettings,
  ModelDeploymentSpec,
  NamedResourceKind,
  ResourceNames,
  ScopeKind,
  SetupChoice,
  SubsystemFlags,
  ValidationIssue,
} from './types';
import { abbreviations } from './utils/abbreviations';
import { newAiServicesEndpoint, parseAiEndpoint } from './utils/endpoint';
import { cognitiveServicesAccountId } from './utils/resource-id';

const hasText = (value: string | undefined): value is string =>
  value !== undefined && value.trim() !== '';

export const resolveResourceName = (
  kind: NamedResourceKind,
  override: string | undefined,
  token: string,
) => (hasText(override) ? override.trim() : `${abbreviations[kind]}${token}`);

export const resolveResourceNames = (
  context: DeploymentContext,
  params: DeploymentParameters,
): ResourceNames => {
  const token = context.resourceToken;
  return {
    resourceGroup: context.resourceGroupName,
    aiServices: resolveResourceName('aiServices', params.aiServicesName, token),
    storageAccount: resolveResourceName('storageAccount', params.storageAccountName, token),
    appServicePlan: resolveResourceName('appServicePlan', params.appServicePlanName, token),
    appService: resolveResourceName('appService', params.appServiceName, token),
    logAnalytics: resolveResourceName('logAnalytics', params.logAnalyticsName, token),
    applicationInsights: resolveResourceName(
      'applicationInsights',
      params.applicationInsightsName,
      token,
    ),
    keyVault: resolveResourceName('keyVault', params.keyVaultName, token),
    searchService: resolveResourceName('searchService', params.searchServiceName, token),
  };
};

export const classifyScope = (
  context: DeploymentContext,
  subscriptionId: string,
  resourceGroupName: string,
): ScopeKind => {
  if (subscriptionId.toLowerCase() !== context.subscriptionId.toLowerCase()) {
    return 'cross-subscription';
  }
  if (resourceGroupName.toLowerCase() !== context.resourceGroupName.toLowerCase()) {
    return 'cross-group';
  }
  return 'same-group';
};

/**
 * Builds a reference to an AI services account this deployment does not own.
 * The subscription and resource group fall back to the deployment's own.
 */
export const parseExistingEndpoint = (
  endpoint: string,
  context: DeploymentContext,
  overrides: { subscriptionId?: string; resourceGroupName?: string } = {},
): AiReference => {
  const parsed = parseAiEndpoint(endpoint);
  if (!parsed.ok) {
    return { kind: 'broken', input: endpoint, reason: parsed.reason };
  }

  const subscriptionId = hasText(overrides.subscriptionId)
    ? overrides.subscriptionId
    : context.subscriptionId;
  const resourceGroupName = hasText(overrides.resourceGroupName)
    ? overrides.resourceGroupName
    : context.resourceGroupName;

  return {
    kind: 'existing',
    reference: {
      logicalName: 'aiServices',
      name: parsed.accountName,
      id: cognitiveServicesAccountId(subscriptionId, resourceGroupName, parsed.accountName),
      endpoint: parsed.endpoint,
    },
    subscriptionId,
    resourceGroupName,
    scope: classifyScope(context, subscriptionId, resourceGroupName),
  };
};

export interface SetupResolution {
  setup: SetupChoice;
  issue?: ValidationIssue;
}

/**
 * A supplied existing endpoint always selects the existing setup; only
 * without one does the `aiSetup` flag decide.
 */
export const resolveSetupChoice = (
  params: Pick<DeploymentParameters, 'aiSetup' | 'existingAiEndpoint'>,
): SetupResolution => {
  if (hasText(params.existingAiEndpoint)) {
    return { setup: 'existing' };
  }
  if (params.aiSetup === 'existing') {
    return {
      setup: 'existing',
      issue: {
        field: 'existingAiEndpoint',
        message: "is required when aiSetup is 'existing'",
      },
    };
  }
  return { setup: 'new' };
};

const modelSpec = (
  name: string,
  format: string,
  version: string,
  skuName: string,
  skuCapacity: number,
): ModelDeploymentSpec => ({ name, format, version, skuName, skuCapacity });

export const deriveSettings = (
  context: DeploymentContext,
  params: DeploymentParameters,
): DerivedSettings => {
  const issues: ValidationIssue[] = [];
  const warnings: string[] = [];
  const names = resolveResourceNames(context, params);

  const resolution = resolveSetupChoice(params);
  if (resolution.issue) {
    issues.push(resolution.issue);
  }

  let ai: AiReference;
  if (resolution.setup === 'new') {
    ai = {
      kind: 'new',
      reference: {
        logicalName: 'aiServices',
        name: names.aiServices,
        id: cognitiveServicesAccountId(
          context.subscriptionId,
          context.resourceGroupName,
          names.aiServices,
        ),
        endpoint: newAiServicesEndpoint(names.aiServices),
      },
    };
    if (hasText(params.existingAiSubscriptionId) || hasText(params.existingAiResourceGroup)) {
      warnings.push(
        'existingAiSubscriptionId/existingAiResourceGroup are ignored for a new AI setup',
      );
    }
  } else if (hasText(params.existingAiEndpoint)) {
    ai = parseExistingEndpoint(params.existingAiEndpoint, context, {
      subscriptionId: params.existingAiSubscriptionId,
      resourceGroupName: params.existingAiResourceGroup,
    });
    if (ai.kind === 'broken') {
      issues.push({
        field: 'existingAiEndpoint',
        message: `is not a valid endpoint URL (${ai.reason})`,
      });
    }
  } else {
    ai = {
      kind: 'broken',
      input: '',
      reason: 'no existing endpoint supplied',
    };
  }

  // A feature never outlives its prerequisite.
  const flags: SubsystemFlags = {
    managedIdentity: params.enableManagedIdentity,
    monitoring: params.enableMonitoring,
    tracing: params.enableMonitoring && params.enableTracing,
    contentRecording: params.enableContentRecording,
    keyVault: params.enableKeyVault,
    search: params.enableSearch,
  };
  if (params.enableTracing && !params.enableMonitoring) {
    warnings.push('enableTracing is ignored because monitoring is disabled');
  }

  // A Key Vault reference only resolves through the web app identity.
  const storesExistingAiKey =
    params.hasExistingAiKey &&
    flags.keyVault &&
    flags.managedIdentity &&
    resolution.setup === 'existing';
  if (params.hasExistingAiKey && !(flags.keyVault && resolution.setup === 'existing')) {
    warnings.push(
      'existingAiKey is ignored; it is only stored for an existing AI setup with Key Vault enabled',
    );
  } else if (params.hasExistingAiKey && !flags.managedIdentity) {
    warnings.push(
      'existingAiKey is ignored; a Key Vault reference needs the web app managed identity',
    );
  }
  if (!flags.managedIdentity) {
    warnings.push(
      'managed identity is disabled and no key is stored; the web app has no credential for the AI endpoint',
    );
  }

  const chat = modelSpec(
    params.chatModelName,
    params.chatModelFormat,
    params.chatModelVersion,
    params.chatModelSkuName,
    params.chatModelCapacity,
  );
  const audio = hasText(params.audioModelName)
    ? modelSpec(
        params.audioModelName,
        params.audioModelFormat,
        params.audioModelVersion,
        params.audioModelSkuName,
        params.audioModelCapacity,
      )
    : undefined;
  // Both deployments would land on the same name.
  const duplicateAudio =
    audio !== undefined && audio.name.toLowerCase() === chat.name.toLowerCase();
  if (duplicateAudio) {
    issues.push({ field: 'audioModelName', message: 'must differ from chatModelName' });
  }

  return {
    context,
    setup: resolution.setup,
    aiLocation: params.aiLocation ?? context.location,
    names,
    flags,
    ai,
    requestedModels: { chat, audio: duplicateAudio ? undefined : audio },
    hasExistingAiKey: params.hasExistingAiKey,
    storesExistingAiKey,
    appServiceSku: params.appServiceSku,
    pythonVersion: params.pythonVersion,
    user: hasText(params.principalId)
      ? { id: params.principalId, type: params.principalType }
      : undefined,
    issues,
    warnings,
  };
};
