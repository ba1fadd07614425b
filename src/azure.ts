// Copyright 2016-2025, Pulumi Corporation.  All rights reserved.

import * as pulumi from '@pulumi/pulumi';
import * as authorization from '@pulumi/azure-native/authorization';
import * as resources from '@pulumi/azure-native/resources';
import * as storage from '@pulumi/azure-native/storage';
import { createDeploymentContext, defaultResourceGroupName } from './context';
import {
  resolveExports,
  stackOutputs,
  StackScope,
  toAppSettings,
} from './helpers';
import { ConfigSource, readParameters } from './parameters';
import { evaluateDeployment } from './pipeline';
import { APP_INSIGHTS_CONNECTION_NAME } from './topology';
import { initialRoleAssignments } from './utils/access.deployment';
import { initialAiServices } from './utils/ai.deployment';
import { initialMonitoring } from './utils/monitoring.deployment';
import { initialSearchService } from './utils/search.deployment';
import { initialKeyVault, initialVaultSecrets } from './utils/vault.deployment';
import {
  initialAppSettings,
  initialWebApp,
  runtimeSettings,
} from './utils/web.deployment';

export interface StackConfig extends ConfigSource {
  getSecret(key: string): pulumi.Output<string> | undefined;
}

export const run = async (config: StackConfig = new pulumi.Config()) => {
  const existingAiKey = config.getSecret('existingAiKey');
  const params = readParameters(config, {
    hasExistingAiKey: existingAiKey !== undefined,
  });
  const clientConfig = await authorization.getClientConfig();

  const context = createDeploymentContext({
    environmentName: params.environmentName,
    location: params.location,
    subscriptionId: clientConfig.subscriptionId,
    tenantId: clientConfig.tenantId,
    resourceGroupName:
      params.resourceGroupName ?? defaultResourceGroupName(params.environmentName),
    seed: params.validationSeed,
  });
  const { plan, access, exports: exported, trace } = evaluateDeployment(context, params);

  plan.warnings.forEach((warning) => pulumi.log.warn(warning));
  pulumi.log.info(`Deployment trace: ${JSON.stringify(trace)}`);

  const tags = { 'azd-env-name': context.environmentName };
  const resourceGroup = new resources.ResourceGroup(context.resourceGroupName, {
    resourceGroupName: context.resourceGroupName,
    location: context.location,
    tags,
  });
  const scope: StackScope = { resourceGroup, location: context.location, tags };

  // Created resources by plan key, so planned dependencies become dependsOn.
  const created = new Map<string, pulumi.Resource>([['resourceGroup', resourceGroup]]);
  const dependenciesOf = (key: string) =>
    (plan.resources.find((resource) => resource.key === key)?.dependsOn ?? [])
      .map((dependency) => created.get(dependency))
      .filter((resource): resource is pulumi.Resource => resource !== undefined);

  // ---------------- STORAGE ----------------
  const storageAccount = new storage.StorageAccount(plan.storage.name, {
    accountName: plan.storage.name,
    resourceGroupName: resourceGroup.name,
    location: context.location,
    sku: {
      name: storage.SkuName.Standard_LRS,
    },
    kind: storage.Kind.StorageV2,
    allowBlobPublicAccess: false,
    minimumTlsVersion: storage.MinimumTlsVersion.TLS1_2,
    tags,
  });
  created.set('storageAccount', storageAccount);

  // ---------------- MONITORING ----------------
  const monitoring = initialMonitoring(plan.monitoring, scope);
  if (monitoring) {
    created.set('logAnalytics', monitoring.workspace);
    created.set('applicationInsights', monitoring.appInsights);
  }

  // ---------------- AI SERVICES ----------------
  const ai = initialAiServices(
    plan.ai,
    scope,
    dependenciesOf('aiServicesAccount'),
    monitoring?.appInsights,
  );
  if (ai.account) {
    created.set('aiServicesAccount', ai.account);
  }
  if (ai.appInsightsConnection) {
    created.set(
      `aiServicesConnection:${APP_INSIGHTS_CONNECTION_NAME}`,
      ai.appInsightsConnection,
    );
  }
  ai.deployments.forEach((deployment, index) => {
    created.set(`modelDeployment:${plan.ai.deployments[index].name}`, deployment);
  });

  // ---------------- SEARCH + KEY VAULT ----------------
  const searchService = initialSearchService(plan.search, scope);
  if (searchService) {
    created.set('searchService', searchService);
  }
  const vault = initialKeyVault(plan.keyVault, context.tenantId, scope);
  if (vault) {
    created.set('keyVault', vault);
  }

  // ---------------- WEB APP ----------------
  const webApp = initialWebApp(plan.compute, scope, dependenciesOf('webApp'));
  created.set('appServicePlan', webApp.plan);
  created.set('webApp', webApp.app);

  initialVaultSecrets(plan.secrets, vault, existingAiKey, scope, [webApp.app]);

  // ---------------- APPLICATION SETTINGS ----------------
  const resolvedExports = resolveExports(exported, {
    webIdentityPrincipalId: webApp.principalId,
    appInsightsConnectionString: monitoring ? monitoring.appInsights.connectionString : '',
  });
  initialAppSettings(
    plan.compute,
    webApp.app,
    toAppSettings(resolvedExports, runtimeSettings(plan.compute)),
    scope,
  );

  // ---------------- ROLE ASSIGNMENTS ----------------
  const keyById = new Map(plan.resources.map((resource) => [resource.id, resource.key]));
  initialRoleAssignments(
    access.bindings,
    plan.compute.systemAssignedIdentity ? webApp.principalId : undefined,
    (binding) => {
      const key = keyById.get(binding.target.id);
      const target = key ? created.get(key) : undefined;
      const dependsOn = target ? [target] : [];
      return binding.principal.role === 'compute' ? [webApp.app, ...dependsOn] : dependsOn;
    },
  );

  return {
    ...stackOutputs(resolvedExports),
    deploymentTrace: trace,
  };
};
