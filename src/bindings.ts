import {
  AccessPlan,
  DeploymentPlan,
  DerivedSettings,
  IdentityBinding,
  PrincipalRef,
  PrincipalRole,
  ResourceReference,
  ScopeDescriptor,
  SkippedBinding,
} from './types';
import { deterministicUuid } from './utils/hash';
import { RoleKey, roleDefinitionResourceId, roles } from './utils/roles';

interface AccessTarget {
  target: ResourceReference;
  scope: ScopeDescriptor;
  grants: Record<PrincipalRole, RoleKey[]>;
}

const localScope = (plan: DeploymentPlan, target: ResourceReference): ScopeDescriptor => ({
  kind: 'same-group',
  subscriptionId: plan.context.subscriptionId,
  resourceGroupName: plan.context.resourceGroupName,
  resourceId: target.id,
});

const aiGrants: Record<PrincipalRole, RoleKey[]> = {
  compute: ['cognitiveServicesOpenAiUser', 'azureAiUser'],
  user: ['cognitiveServicesUser'],
};

export const collectPrincipals = (
  plan: DeploymentPlan,
  derived: DerivedSettings,
): Partial<Record<PrincipalRole, PrincipalRef>> => {
  const principals: Partial<Record<PrincipalRole, PrincipalRef>> = {};
  if (plan.compute.systemAssignedIdentity) {
    // The object id only exists once the web app is created; the app's
    // resource id stands in for it when naming bindings.
    principals.compute = {
      role: 'compute',
      key: plan.compute.app.id,
      type: 'ServicePrincipal',
    };
  }
  if (derived.user && derived.user.id.trim() !== '') {
    principals.user = {
      role: 'user',
      principalId: derived.user.id,
      key: derived.user.id,
      type: derived.user.type,
    };
  }
  return principals;
};

const collectTargets = (
  plan: DeploymentPlan,
  derived: DerivedSettings,
  skipped: SkippedBinding[],
): AccessTarget[] => {
  const targets: AccessTarget[] = [
    {
      target: plan.storage,
      scope: localScope(plan, plan.storage),
      grants: {
        compute: ['storageBlobDataContributor'],
        user: ['storageBlobDataContributor'],
      },
    },
  ];

  if (plan.monitoring) {
    const appInsights = plan.monitoring.applicationInsights;
    targets.push({
      target: appInsights,
      scope: localScope(plan, appInsights),
      grants: { compute: ['monitoringMetricsPublisher'], user: [] },
    });
  }

  if (derived.ai.kind === 'new') {
    targets.push({
      target: derived.ai.reference,
      scope: localScope(plan, derived.ai.reference),
      grants: aiGrants,
    });
  } else if (derived.ai.kind === 'existing') {
    targets.push({
      target: derived.ai.reference,
      scope: {
        kind: derived.ai.scope,
        subscriptionId: derived.ai.subscriptionId,
        resourceGroupName: derived.ai.resourceGroupName,
        resourceId: derived.ai.reference.id,
      },
      grants: aiGrants,
    });
  } else {
    for (const principal of ['compute', 'user'] as const) {
      for (const roleKey of aiGrants[principal]) {
        skipped.push({
          principal,
          roleName: roles[roleKey].name,
          target: 'aiServices',
          reason: `AI services reference is broken (${derived.ai.reason})`,
        });
      }
    }
  }

  if (plan.search) {
    targets.push({
      target: plan.search,
      scope: localScope(plan, plan.search),
      grants: {
        compute: ['searchIndexDataContributor'],
        user: ['searchIndexDataContributor'],
      },
    });
  }

  if (plan.keyVault) {
    targets.push({
      target: plan.keyVault,
      scope: localScope(plan, plan.keyVault),
      grants: {
        compute: ['keyVaultSecretsUser'],
        user: ['keyVaultSecretsOfficer'],
      },
    });
  }

  return targets;
};

export const bindingFor = (
  principal: PrincipalRef,
  roleKey: RoleKey,
  target: ResourceReference,
  scope: ScopeDescriptor,
): IdentityBinding => {
  const role = roles[roleKey];
  return {
    name: deterministicUuid(scope.resourceId, principal.key, role.id),
    principal,
    roleName: role.name,
    roleId: role.id,
    roleDefinitionId: roleDefinitionResourceId(scope.subscriptionId, role.id),
    target,
    scope,
  };
};

/**
 * Role assignments for the web app identity and the deploying principal
 * over every resource the plan creates or references.
 */
export const bindIdentities = (
  plan: DeploymentPlan,
  derived: DerivedSettings,
): AccessPlan => {
  const skipped: SkippedBinding[] = [];
  const principals = collectPrincipals(plan, derived);
  const targets = collectTargets(plan, derived, skipped);

  if (!principals.compute) {
    skipped.push({
      principal: 'compute',
      roleName: 'all',
      target: 'all',
      reason: 'managed identity is disabled',
    });
  }
  if (!principals.user) {
    skipped.push({
      principal: 'user',
      roleName: 'all',
      target: 'all',
      reason: 'no principalId supplied',
    });
  }

  const bindings: IdentityBinding[] = [];
  for (const { target, scope, grants } of targets) {
    for (const role of ['compute', 'user'] as const) {
      const principal = principals[role];
      if (!principal) continue;
      for (const roleKey of grants[role]) {
        bindings.push(bindingFor(principal, roleKey, target, scope));
      }
    }
  }

  return { bindings, skipped };
};
