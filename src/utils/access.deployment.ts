import * as authorization from '@pulumi/azure-native/authorization';
import * as pulumi from '@pulumi/pulumi';
import { IdentityBinding } from '../types';
import { deterministicUuid } from './hash';

export const initialRoleAssignments = (
  bindings: IdentityBinding[],
  computePrincipalId: pulumi.Output<string> | undefined,
  dependsOnFor: (binding: IdentityBinding) => pulumi.Resource[],
) =>
  bindings.flatMap((binding) => {
    const principalId = binding.principal.principalId ?? computePrincipalId;
    if (!principalId) return [];
    // Keyed by the resolved object id, not the planned principal key.
    const roleAssignmentName = pulumi
      .output(principalId)
      .apply((id) => deterministicUuid(binding.scope.resourceId, id, binding.roleId));
    return [
      new authorization.RoleAssignment(
        `role-${binding.name}`,
        {
          roleAssignmentName,
          principalId,
          principalType:
            binding.principal.type === 'User'
              ? authorization.PrincipalType.User
              : authorization.PrincipalType.ServicePrincipal,
          roleDefinitionId: binding.roleDefinitionId,
          scope: binding.scope.resourceId,
        },
        { dependsOn: dependsOnFor(binding) },
      ),
    ];
  });
