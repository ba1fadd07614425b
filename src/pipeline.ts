import { bindIdentities } from './bindings';
import { deriveSettings } from './derivation';
import { ParameterValidationError } from './errors';
import { buildExports, ExportedConfig } from './exports';
import { DeploymentParameters } from './parameters';
import { buildTopology } from './topology';
import {
  AccessPlan,
  AiStatus,
  DeploymentContext,
  DeploymentPlan,
  DerivedSettings,
  ResourceNames,
  SetupChoice,
  SkippedBinding,
  SubsystemFlags,
} from './types';

export interface DeploymentTrace {
  resourceToken: string;
  seeded: boolean;
  setup: SetupChoice;
  aiStatus: AiStatus;
  names: ResourceNames;
  subsystems: SubsystemFlags;
  resources: string[];
  models: { deployed: string[]; dropped: string[] };
  bindings: { name: string; principal: string; role: string; target: string; scope: string }[];
  skippedBindings: SkippedBinding[];
  warnings: string[];
}

export interface DeploymentEvaluation {
  derived: DerivedSettings;
  plan: DeploymentPlan;
  access: AccessPlan;
  exports: ExportedConfig;
  trace: DeploymentTrace;
}

export interface EvaluateOptions {
  /** Reject derivation issues instead of planning around them. Defaults to true. */
  strict?: boolean;
}

export const buildTrace = (
  derived: DerivedSettings,
  plan: DeploymentPlan,
  access: AccessPlan,
): DeploymentTrace => ({
  resourceToken: derived.context.resourceToken,
  seeded: derived.context.seed !== undefined,
  setup: plan.setup,
  aiStatus: plan.ai.status,
  names: derived.names,
  subsystems: derived.flags,
  resources: plan.resources.map((resource) => resource.key),
  models: {
    deployed: plan.ai.deployments.map((deployment) => deployment.name),
    dropped: plan.ai.droppedDeployments.map((deployment) => deployment.name),
  },
  bindings: access.bindings.map((binding) => ({
    name: binding.name,
    principal: binding.principal.role,
    role: binding.roleName,
    target: binding.target.name,
    scope: binding.scope.kind,
  })),
  skippedBindings: access.skipped,
  warnings: plan.warnings,
});

export const evaluateDeployment = (
  context: DeploymentContext,
  params: DeploymentParameters,
  options: EvaluateOptions = {},
): DeploymentEvaluation => {
  const derived = deriveSettings(context, params);
  if ((options.strict ?? true) && derived.issues.length > 0) {
    throw new ParameterValidationError(derived.issues);
  }

  const plan = buildTopology(derived);
  const access = bindIdentities(plan, derived);
  const exported = buildExports(plan, derived);

  return { derived, plan, access, exports: exported, trace: buildTrace(derived, plan, access) };
};
