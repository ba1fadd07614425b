import * as search from '@pulumi/azure-native/search';
import { StackScope } from '../helpers';
import { ResourceReference } from '../types';

export const initialSearchService = (
  service: ResourceReference | undefined,
  scope: StackScope,
) => {
  if (!service) return undefined;
  return new search.Service(service.name, {
    searchServiceName: service.name,
    resourceGroupName: scope.resourceGroup.name,
    location: scope.location,
    sku: { name: search.SkuName.Basic },
    replicaCount: 1,
    partitionCount: 1,
    tags: scope.tags,
  });
};
