import {
  AiPlan,
  ComputePlan,
  DeploymentPlan,
  DerivedSettings,
  ModelDeploymentSpec,
  MonitoringPlan,
  PlannedResource,
  PlannedSecret,
  ResourceReference,
} from './types';
import { childResourceId, resourceId } from './utils/resource-id';

/** Regions where the chat and audio models can be deployed side by side. */
export const CHAT_AND_AUDIO_REGIONS = ['eastus', 'eastus2', 'swedencentral'];

export const AI_KEY_SECRET_NAME = 'ai-inference-key';
export const APP_INSIGHTS_CONNECTION_NAME = 'appinsights';
export const STARTUP_COMMAND = 'gunicorn --bind=0.0.0.0 --timeout 600 app:app';

export interface ModelSelection {
  deployments: ModelDeploymentSpec[];
  dropped: ModelDeploymentSpec[];
  warning?: string;
}

export const selectModelDeployments = (
  requested: DerivedSettings['requestedModels'],
  aiLocation: string,
): ModelSelection => {
  const { chat, audio } = requested;
  if (!audio) {
    return { deployments: [chat], dropped: [] };
  }
  if (CHAT_AND_AUDIO_REGIONS.includes(aiLocation.toLowerCase())) {
    return { deployments: [chat, audio], dropped: [] };
  }
  return {
    deployments: [chat],
    dropped: [audio],
    warning:
      `Audio model '${audio.name}' cannot be deployed with '${chat.name}' in region '${aiLocation}' ` +
      `(supported: ${CHAT_AND_AUDIO_REGIONS.join(', ')}); deploying the chat model only`,
  };
};

export const keyVaultReference = (vaultName: string, secretName: string) =>
  `@Microsoft.KeyVault(VaultName=${vaultName};SecretName=${secretName})`;

export const buildTopology = (derived: DerivedSettings): DeploymentPlan => {
  const { context, names, flags } = derived;
  const warnings = [...derived.warnings];
  const resources: PlannedResource[] = [];

  const idOf = (provider: string, type: string, name: string) =>
    resourceId(context.subscriptionId, context.resourceGroupName, provider, type, name);
  const add = (resource: PlannedResource) => {
    resources.push(resource);
    return resource;
  };

  add({
    key: 'resourceGroup',
    kind: 'resourceGroup',
    subsystem: 'core',
    name: names.resourceGroup,
    id: context.resourceGroupId,
    dependsOn: [],
  });

  // ---------------- STORAGE ----------------
  const storage: ResourceReference = {
    logicalName: 'storageAccount',
    name: names.storageAccount,
    id: idOf('Microsoft.Storage', 'storageAccounts', names.storageAccount),
    endpoint: `https://${names.storageAccount}.blob.core.windows.net/`,
  };
  add({
    key: 'storageAccount',
    kind: 'storageAccount',
    subsystem: 'storage',
    name: storage.name,
    id: storage.id,
    dependsOn: ['resourceGroup'],
  });

  // ---------------- MONITORING ----------------
  let monitoring: MonitoringPlan | undefined;
  if (flags.monitoring) {
    const logAnalytics: ResourceReference = {
      logicalName: 'logAnalytics',
      name: names.logAnalytics,
      id: idOf('Microsoft.OperationalInsights', 'workspaces', names.logAnalytics),
      endpoint: '',
    };
    const applicationInsights: ResourceReference = {
      logicalName: 'applicationInsights',
      name: names.applicationInsights,
      id: idOf('Microsoft.Insights', 'components', names.applicationInsights),
      endpoint: '',
    };
    add({
      key: 'logAnalytics',
      kind: 'logAnalyticsWorkspace',
      subsystem: 'monitoring',
      name: logAnalytics.name,
      id: logAnalytics.id,
      dependsOn: ['resourceGroup'],
    });
    add({
      key: 'applicationInsights',
      kind: 'applicationInsights',
      subsystem: 'monitoring',
      name: applicationInsights.name,
      id: applicationInsights.id,
      dependsOn: ['logAnalytics'],
    });
    monitoring = { logAnalytics, applicationInsights, workspaceId: logAnalytics.id };
  }

  // ---------------- AI SERVICES ----------------
  let ai: AiPlan;
  if (derived.ai.kind === 'new') {
    const selection = selectModelDeployments(derived.requestedModels, derived.aiLocation);
    if (selection.warning) {
      warnings.push(selection.warning);
    }
    const account = derived.ai.reference;
    add({
      key: 'aiServicesAccount',
      kind: 'aiServicesAccount',
      subsystem: 'ai',
      name: account.name,
      id: account.id,
      dependsOn: [
        'resourceGroup',
        'storageAccount',
        ...(monitoring ? ['applicationInsights'] : []),
      ],
    });
    if (monitoring) {
      add({
        key: `aiServicesConnection:${APP_INSIGHTS_CONNECTION_NAME}`,
        kind: 'aiServicesConnection',
        subsystem: 'monitoring',
        name: APP_INSIGHTS_CONNECTION_NAME,
        id: childResourceId(account.id, 'connections', APP_INSIGHTS_CONNECTION_NAME),
        dependsOn: ['aiServicesAccount', 'applicationInsights'],
      });
    }
    // The service rejects concurrent deployment updates on one account.
    let previous = 'aiServicesAccount';
    for (const deployment of selection.deployments) {
      const key = `modelDeployment:${deployment.name}`;
      add({
        key,
        kind: 'modelDeployment',
        subsystem: 'ai',
        name: deployment.name,
        id: childResourceId(account.id, 'deployments', deployment.name),
        dependsOn: previous === 'aiServicesAccount' ? [previous] : ['aiServicesAccount', previous],
      });
      previous = key;
    }
    ai = {
      status: 'provisioned',
      location: derived.aiLocation,
      reference: account,
      storageAccountId: storage.id,
      appInsightsId: monitoring?.applicationInsights.id ?? '',
      deployments: selection.deployments,
      droppedDeployments: selection.dropped,
    };
  } else if (derived.ai.kind === 'existing') {
    ai = {
      status: 'referenced',
      location: derived.aiLocation,
      reference: derived.ai.reference,
      storageAccountId: '',
      appInsightsId: '',
      deployments: [],
      droppedDeployments: [],
    };
  } else {
    warnings.push(
      `AI services reference could not be resolved (${derived.ai.reason}); AI access is not configured`,
    );
    ai = {
      status: 'broken-reference',
      location: derived.aiLocation,
      storageAccountId: '',
      appInsightsId: '',
      deployments: [],
      droppedDeployments: [],
    };
  }

  // ---------------- SEARCH ----------------
  let search: ResourceReference | undefined;
  if (flags.search) {
    search = {
      logicalName: 'searchService',
      name: names.searchService,
      id: idOf('Microsoft.Search', 'searchServices', names.searchService),
      endpoint: `https://${names.searchService}.search.windows.net`,
    };
    add({
      key: 'searchService',
      kind: 'searchService',
      subsystem: 'search',
      name: search.name,
      id: search.id,
      dependsOn: ['resourceGroup'],
    });
  }

  // ---------------- KEY VAULT ----------------
  let keyVault: ResourceReference | undefined;
  if (flags.keyVault) {
    keyVault = {
      logicalName: 'keyVault',
      name: names.keyVault,
      id: idOf('Microsoft.KeyVault', 'vaults', names.keyVault),
      endpoint: `https://${names.keyVault}.vault.azure.net/`,
    };
    add({
      key: 'keyVault',
      kind: 'keyVault',
      subsystem: 'keyVault',
      name: keyVault.name,
      id: keyVault.id,
      dependsOn: ['resourceGroup'],
    });
  }

  // ---------------- COMPUTE ----------------
  const compute: ComputePlan = {
    plan: {
      logicalName: 'appServicePlan',
      name: names.appServicePlan,
      id: idOf('Microsoft.Web', 'serverfarms', names.appServicePlan),
      endpoint: '',
    },
    app: {
      logicalName: 'appService',
      name: names.appService,
      id: idOf('Microsoft.Web', 'sites', names.appService),
      endpoint: `https://${names.appService}.azurewebsites.net`,
    },
    sku: derived.appServiceSku,
    linuxFxVersion: `PYTHON|${derived.pythonVersion}`,
    startupCommand: STARTUP_COMMAND,
    systemAssignedIdentity: flags.managedIdentity,
    appInsightsConnected: monitoring !== undefined,
  };
  add({
    key: 'appServicePlan',
    kind: 'appServicePlan',
    subsystem: 'compute',
    name: compute.plan.name,
    id: compute.plan.id,
    dependsOn: ['resourceGroup'],
  });
  add({
    key: 'webApp',
    kind: 'webApp',
    subsystem: 'compute',
    name: compute.app.name,
    id: compute.app.id,
    dependsOn: [
      'appServicePlan',
      ...(monitoring ? ['applicationInsights'] : []),
      ...(ai.status === 'provisioned' ? ['aiServicesAccount'] : []),
    ],
  });

  // ---------------- SECRETS ----------------
  const secrets: PlannedSecret[] = [];
  if (keyVault && derived.ai.kind === 'existing' && derived.storesExistingAiKey) {
    secrets.push({
      name: AI_KEY_SECRET_NAME,
      vaultName: keyVault.name,
      reference: keyVaultReference(keyVault.name, AI_KEY_SECRET_NAME),
    });
    add({
      key: `keyVaultSecret:${AI_KEY_SECRET_NAME}`,
      kind: 'keyVaultSecret',
      subsystem: 'keyVault',
      name: AI_KEY_SECRET_NAME,
      id: childResourceId(keyVault.id, 'secrets', AI_KEY_SECRET_NAME),
      dependsOn: ['keyVault', 'webApp'],
    });
  }

  return {
    context,
    setup: derived.setup,
    resources,
    storage,
    monitoring,
    ai,
    search,
    keyVault,
    compute,
    secrets,
    warnings,
  };
};
