export type SetupChoice = 'new' | 'existing';

export type PrincipalType = 'User' | 'ServicePrincipal';

export type ResourceKind =
  | 'resourceGroup'
  | 'storageAccount'
  | 'logAnalyticsWorkspace'
  | 'applicationInsights'
  | 'aiServicesAccount'
  | 'aiServicesConnection'
  | 'modelDeployment'
  | 'searchService'
  | 'keyVault'
  | 'keyVaultSecret'
  | 'appServicePlan'
  | 'webApp';

export type Subsystem =
  | 'core'
  | 'storage'
  | 'monitoring'
  | 'ai'
  | 'search'
  | 'keyVault'
  | 'compute';

/** Kinds whose default names are generated from the resource token. */
export type NamedResourceKind =
  | 'aiServices'
  | 'storageAccount'
  | 'appServicePlan'
  | 'appService'
  | 'logAnalytics'
  | 'applicationInsights'
  | 'keyVault'
  | 'searchService';

export type ResourceNames = Record<NamedResourceKind, string> & {
  resourceGroup: string;
};

export interface DeploymentContext {
  readonly environmentName: string;
  readonly location: string;
  readonly subscriptionId: string;
  readonly tenantId: string;
  readonly resourceGroupName: string;
  readonly resourceGroupId: string;
  readonly seed?: string;
  readonly resourceToken: string;
}

export interface ModelDeploymentSpec {
  name: string;
  format: string;
  version: string;
  skuName: string;
  skuCapacity: number;
}

export interface ResourceReference {
  logicalName: string;
  name: string;
  id: string;
  endpoint: string;
}

export type ScopeKind = 'same-group' | 'cross-group' | 'cross-subscription';

export interface ScopeDescriptor {
  kind: ScopeKind;
  subscriptionId: string;
  resourceGroupName: string;
  resourceId: string;
}

export type AiReference =
  | { kind: 'new'; reference: ResourceReference }
  | {
      kind: 'existing';
      reference: ResourceReference;
      subscriptionId: string;
      resourceGroupName: string;
      scope: ScopeKind;
    }
  | { kind: 'broken'; input: string; reason: string };

export interface SubsystemFlags {
  managedIdentity: boolean;
  monitoring: boolean;
  tracing: boolean;
  contentRecording: boolean;
  keyVault: boolean;
  search: boolean;
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface DeployingPrincipal {
  id: string;
  type: PrincipalType;
}

export interface DerivedSettings {
  context: DeploymentContext;
  setup: SetupChoice;
  aiLocation: string;
  names: ResourceNames;
  flags: SubsystemFlags;
  ai: AiReference;
  requestedModels: {
    chat: ModelDeploymentSpec;
    audio?: ModelDeploymentSpec;
  };
  hasExistingAiKey: boolean;
  /** The supplied key is written to Key Vault and exported as a reference. */
  storesExistingAiKey: boolean;
  appServiceSku: string;
  pythonVersion: string;
  user?: DeployingPrincipal;
  issues: ValidationIssue[];
  warnings: string[];
}

export interface PlannedResource {
  key: string;
  kind: ResourceKind;
  subsystem: Subsystem;
  name: string;
  id: string;
  dependsOn: string[];
}

export type AiStatus = 'provisioned' | 'referenced' | 'broken-reference';

export interface AiPlan {
  status: AiStatus;
  location: string;
  reference?: ResourceReference;
  storageAccountId: string;
  /** Application Insights wired into the account as a connection, or ''. */
  appInsightsId: string;
  deployments: ModelDeploymentSpec[];
  droppedDeployments: ModelDeploymentSpec[];
}

export interface MonitoringPlan {
  logAnalytics: ResourceReference;
  applicationInsights: ResourceReference;
  workspaceId: string;
}

export interface ComputePlan {
  plan: ResourceReference;
  app: ResourceReference;
  sku: string;
  linuxFxVersion: string;
  startupCommand: string;
  systemAssignedIdentity: boolean;
  appInsightsConnected: boolean;
}

export interface PlannedSecret {
  name: string;
  vaultName: string;
  reference: string;
}

export interface DeploymentPlan {
  context: DeploymentContext;
  setup: SetupChoice;
  resources: PlannedResource[];
  storage: ResourceReference;
  monitoring?: MonitoringPlan;
  ai: AiPlan;
  search?: ResourceReference;
  keyVault?: ResourceReference;
  compute: ComputePlan;
  secrets: PlannedSecret[];
  warnings: string[];
}

export type PrincipalRole = 'compute' | 'user';

export interface PrincipalRef {
  role: PrincipalRole;
  /** Object id, or `undefined` while it is only known after deployment. */
  principalId?: string;
  /** Stable key used when hashing the binding name. */
  key: string;
  type: PrincipalType;
}

export interface IdentityBinding {
  name: string;
  principal: PrincipalRef;
  roleName: string;
  roleId: string;
  roleDefinitionId: string;
  target: ResourceReference;
  scope: ScopeDescriptor;
}

export interface SkippedBinding {
  principal: PrincipalRole;
  roleName: string;
  target: string;
  reason: string;
}

export interface AccessPlan {
  bindings: IdentityBinding[];
  skipped: SkippedBinding[];
}

export type DeferredKey = 'webIdentityPrincipalId' | 'appInsightsConnectionString';

export interface DeferredValue {
  deferred: DeferredKey;
}

export type ExportValue = string | boolean | DeferredValue;
