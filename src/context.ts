import { DeploymentContext } from './types';
import { resourceGroupPrefix } from './utils/abbreviations';
import { resourceToken } from './utils/hash';
import { resourceGroupId } from './utils/resource-id';

export interface DeploymentContextInput {
  environmentName: string;
  location: string;
  subscriptionId: string;
  tenantId: string;
  resourceGroupName: string;
  /** Only set in validation mode, to make test runs reproducible. */
  seed?: string;
}

export const defaultResourceGroupName = (environmentName: string) =>
  `${resourceGroupPrefix}${environmentName}`;

export const createDeploymentContext = (
  input: DeploymentContextInput,
): DeploymentContext => {
  const groupId = resourceGroupId(input.subscriptionId, input.resourceGroupName);
  const tokenParts = [groupId, input.environmentName, input.location];
  if (input.seed) {
    tokenParts.push(input.seed);
  }

  return Object.freeze({
    environmentName: input.environmentName,
    location: input.location,
    subscriptionId: input.subscriptionId,
    tenantId: input.tenantId,
    resourceGroupName: input.resourceGroupName,
    resourceGroupId: groupId,
    seed: input.seed,
    resourceToken: resourceToken(...tokenParts),
  });
};
