import * as web from '@pulumi/azure-native/web';
import * as pulumi from '@pulumi/pulumi';
import { StackScope } from '../helpers';
import { ComputePlan } from '../types';

export const runtimeSettings = (compute: ComputePlan): Record<string, string> => ({
  SCM_DO_BUILD_DURING_DEPLOYMENT: 'true',
  ENABLE_ORYX_BUILD: 'true',
  ...(compute.appInsightsConnected
    ? {
        ApplicationInsightsAgent_EXTENSION_VERSION: '~3',
        XDT_MicrosoftApplicationInsights_Mode: 'recommended',
      }
    : {}),
});

export const initialWebApp = (
  compute: ComputePlan,
  scope: StackScope,
  dependsOn: pulumi.Resource[],
) => {
  const plan = new web.AppServicePlan(compute.plan.name, {
    name: compute.plan.name,
    resourceGroupName: scope.resourceGroup.name,
    location: scope.location,
    sku: { name: compute.sku },
    kind: 'linux',
    reserved: true,
    tags: scope.tags,
  });

  const app = new web.WebApp(
    compute.app.name,
    {
      name: compute.app.name,
      resourceGroupName: scope.resourceGroup.name,
      location: scope.location,
      serverFarmId: plan.id,
      kind: 'app,linux',
      reserved: true,
      identity: compute.systemAssignedIdentity
        ? { type: web.ManagedServiceIdentityType.SystemAssigned }
        : undefined,
      siteConfig: {
        linuxFxVersion: compute.linuxFxVersion,
        appCommandLine: compute.startupCommand,
        ftpsState: 'Disabled',
        minTlsVersion: '1.2',
        http20Enabled: true,
      },
      httpsOnly: true,
      tags: { ...scope.tags, 'azd-service-name': 'web' },
    },
    { dependsOn: [plan, ...dependsOn] },
  );

  const principalId = app.identity.apply((identity) => identity?.principalId ?? '');

  return { plan, app, principalId };
};

export const initialAppSettings = (
  compute: ComputePlan,
  app: web.WebApp,
  settings: pulumi.Output<Record<string, string>>,
  scope: StackScope,
) =>
  new web.WebAppApplicationSettings(`${compute.app.name}-app-settings`, {
    name: app.name,
    resourceGroupName: scope.resourceGroup.name,
    properties: settings,
  });
