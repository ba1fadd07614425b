export const resourceGroupId = (subscriptionId: string, resourceGroupName: string) =>
  `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroupName}`;

export const resourceId = (
  subscriptionId: string,
  resourceGroupName: string,
  provider: string,
  type: string,
  name: string,
) =>
  `${resourceGroupId(subscriptionId, resourceGroupName)}/providers/${provider}/${type}/${name}`;

export const cognitiveServicesAccountId = (
  subscriptionId: string,
  resourceGroupName: string,
  accountName: string,
) =>
  resourceId(
    subscriptionId,
    resourceGroupName,
    'Microsoft.CognitiveServices',
    'accounts',
    accountName,
  );

export const childResourceId = (parentId: string, type: string, name: string) =>
  `${parentId}/${type}/${name}`;
