import * as keyvault from '@pulumi/azure-native/keyvault';
import * as pulumi from '@pulumi/pulumi';
import { StackScope } from '../helpers';
import { PlannedSecret, ResourceReference } from '../types';

export const initialKeyVault = (
  vault: ResourceReference | undefined,
  tenantId: string,
  scope: StackScope,
) => {
  if (!vault) return undefined;
  return new keyvault.Vault(vault.name, {
    vaultName: vault.name,
    resourceGroupName: scope.resourceGroup.name,
    location: scope.location,
    properties: {
      tenantId,
      sku: {
        family: keyvault.SkuFamily.A,
        name: keyvault.SkuName.Standard,
      },
      // Access is granted through role assignments, not access policies.
      enableRbacAuthorization: true,
    },
    tags: scope.tags,
  });
};

export const initialVaultSecrets = (
  secrets: PlannedSecret[],
  vault: keyvault.Vault | undefined,
  value: pulumi.Output<string> | undefined,
  scope: StackScope,
  dependsOn: pulumi.Resource[],
) => {
  if (!vault || !value) return [];
  return secrets.map(
    (secret) =>
      new keyvault.Secret(
        `${secret.vaultName}-${secret.name}`,
        {
          secretName: secret.name,
          vaultName: vault.name,
          resourceGroupName: scope.resourceGroup.name,
          properties: { value: pulumi.secret(value) },
        },
        { dependsOn: [vault, ...dependsOn] },
      ),
  );
};
