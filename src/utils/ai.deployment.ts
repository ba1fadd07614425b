import * as insights from '@pulumi/azure-native/applicationinsights';
import * as cognitiveservices from '@pulumi/azure-native/cognitiveservices';
import * as pulumi from '@pulumi/pulumi';
import { StackScope } from '../helpers';
import { APP_INSIGHTS_CONNECTION_NAME } from '../topology';
import { AiPlan } from '../types';

export interface AiResources {
  account?: cognitiveservices.Account;
  appInsightsConnection?: cognitiveservices.AccountConnection;
  deployments: cognitiveservices.Deployment[];
}

export const initialAiServices = (
  ai: AiPlan,
  scope: StackScope,
  dependsOn: pulumi.Resource[],
  appInsights?: insights.Component,
): AiResources => {
  // Referenced or unresolved accounts are not ours to create.
  const reference = ai.reference;
  if (ai.status !== 'provisioned' || !reference) {
    return { deployments: [] };
  }

  const account = new cognitiveservices.Account(
    reference.name,
    {
      accountName: reference.name,
      resourceGroupName: scope.resourceGroup.name,
      location: ai.location,
      kind: 'AIServices',
      sku: { name: 'S0' },
      identity: {
        type: cognitiveservices.ResourceIdentityType.SystemAssigned,
      },
      properties: {
        customSubDomainName: reference.name,
        publicNetworkAccess: 'Enabled',
        disableLocalAuth: true,
        userOwnedStorage: ai.storageAccountId
          ? [{ resourceId: ai.storageAccountId }]
          : undefined,
      },
      tags: scope.tags,
    },
    { dependsOn },
  );

  const appInsightsConnection =
    ai.appInsightsId && appInsights
      ? new cognitiveservices.AccountConnection(
          `${reference.name}-${APP_INSIGHTS_CONNECTION_NAME}`,
          {
            accountName: account.name,
            connectionName: APP_INSIGHTS_CONNECTION_NAME,
            resourceGroupName: scope.resourceGroup.name,
            properties: {
              authType: 'ApiKey',
              category: 'AppInsights',
              target: appInsights.id,
              isSharedToAll: true,
              credentials: { key: appInsights.connectionString },
              metadata: {
                ApiType: 'Azure',
                ResourceId: appInsights.id,
              },
            },
          },
          { dependsOn: [account, appInsights] },
        )
      : undefined;

  // Deployments on one account must be created one after another.
  const deployments: cognitiveservices.Deployment[] = [];
  let previous: pulumi.Resource = account;
  for (const spec of ai.deployments) {
    const deployment = new cognitiveservices.Deployment(
      `${reference.name}-${spec.name}`,
      {
        accountName: account.name,
        deploymentName: spec.name,
        resourceGroupName: scope.resourceGroup.name,
        sku: {
          name: spec.skuName,
          capacity: spec.skuCapacity,
        },
        properties: {
          model: {
            format: spec.format,
            name: spec.name,
            version: spec.version,
          },
        },
      },
      { dependsOn: [previous] },
    );
    deployments.push(deployment);
    previous = deployment;
  }

  return { account, appInsightsConnection, deployments };
};
