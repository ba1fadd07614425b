import * as insights from '@pulumi/azure-native/applicationinsights';
import * as operationalinsights from '@pulumi/azure-native/operationalinsights';
import { StackScope } from '../helpers';
import { MonitoringPlan } from '../types';

export interface MonitoringResources {
  workspace: operationalinsights.Workspace;
  appInsights: insights.Component;
}

export const initialMonitoring = (
  monitoring: MonitoringPlan | undefined,
  scope: StackScope,
): MonitoringResources | undefined => {
  if (!monitoring) return undefined;

  const workspace = new operationalinsights.Workspace(monitoring.logAnalytics.name, {
    workspaceName: monitoring.logAnalytics.name,
    resourceGroupName: scope.resourceGroup.name,
    location: scope.location,
    sku: { name: 'PerGB2018' },
    retentionInDays: 30,
    features: {
      enableLogAccessUsingOnlyResourcePermissions: true,
    },
    tags: scope.tags,
  });

  const appInsights = new insights.Component(
    monitoring.applicationInsights.name,
    {
      resourceName: monitoring.applicationInsights.name,
      resourceGroupName: scope.resourceGroup.name,
      applicationType: insights.ApplicationType.Web,
      location: scope.location,
      kind: 'web',
      workspaceResourceId: monitoring.workspaceId,
      ingestionMode: 'LogAnalytics',
      tags: scope.tags,
    },
    { dependsOn: [workspace] },
  );

  return { workspace, appInsights };
};
