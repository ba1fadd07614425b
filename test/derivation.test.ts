import { createDeploymentContext } from '../src/context';
import {
  classifyScope,
  parseExistingEndpoint,
  resolveResourceName,
  resolveResourceNames,
  resolveSetupChoice,
} from '../src/derivation';
import { RESOURCE_TOKEN_LENGTH } from '../src/utils/hash';
import {
  makeContext,
  makeDerived,
  makeParams,
  OTHER_SUBSCRIPTION_ID,
  SUBSCRIPTION_ID,
  TENANT_ID,
  USER_PRINCIPAL_ID,
} from './fixtures';

describe('deployment context', () => {
  test('derives a stable lowercase token', () => {
    const first = makeContext();
    const second = makeContext();

    expect(first.resourceToken).toBe(second.resourceToken);
    expect(first.resourceToken).toHaveLength(RESOURCE_TOKEN_LENGTH);
    expect(first.resourceToken).toMatch(/^[a-z2-7]+$/);
    expect(first.resourceGroupId).toBe(
      `/subscriptions/${SUBSCRIPTION_ID}/resourceGroups/rg-demo1`,
    );
  });

  test('changes the token with environment, region or seed', () => {
    const base = makeContext().resourceToken;

    expect(makeContext({ environmentName: 'demo9' }).resourceToken).not.toBe(base);
    expect(makeContext({ location: 'westus' }).resourceToken).not.toBe(base);
    expect(makeContext({ seed: 'test-seed' }).resourceToken).not.toBe(base);
    expect(makeContext({ seed: 'test-seed' }).resourceToken).toBe(
      makeContext({ seed: 'test-seed' }).resourceToken,
    );
  });

  test('is frozen', () => {
    const context = createDeploymentContext({
      environmentName: 'demo1',
      location: 'eastus',
      subscriptionId: SUBSCRIPTION_ID,
      tenantId: TENANT_ID,
      resourceGroupName: 'rg-demo1',
    });
    expect(Object.isFrozen(context)).toBe(true);
  });
});

describe('resource naming', () => {
  test('prefixes the token unless overridden', () => {
    expect(resolveResourceName('storageAccount', undefined, 'tok')).toBe('sttok');
    expect(resolveResourceName('keyVault', '  ', 'tok')).toBe('kv-tok');
    expect(resolveResourceName('storageAccount', 'mystorage', 'tok')).toBe('mystorage');
  });

  test('names every resource kind from one token', () => {
    const context = makeContext();
    const token = context.resourceToken;
    const names = resolveResourceNames(context, makeParams({ appServiceName: 'app-custom' }));

    expect(names).toEqual({
      resourceGroup: 'rg-demo1',
      aiServices: `cog-${token}`,
      storageAccount: `st${token}`,
      appServicePlan: `plan-${token}`,
      appService: 'app-custom',
      logAnalytics: `log-${token}`,
      applicationInsights: `appi-${token}`,
      keyVault: `kv-${token}`,
      searchService: `srch-${token}`,
    });
  });
});

describe('existing endpoint references', () => {
  const accountId = (subscriptionId: string, group: string) =>
    `/subscriptions/${subscriptionId}/resourceGroups/${group}/providers/Microsoft.CognitiveServices/accounts/myproj`;

  test.each([
    'https://myproj.eastus.models.ai.azure.com/models',
    'https://myproj.eastus.models.ai.azure.com',
    'https://MyProj.eastus.models.ai.azure.com/models/',
    'https://myproj.eastus.models.ai.azure.com?api-version=2024-05-01-preview',
    'https://myproj.eastus.models.ai.azure.com/models?api-version=2024-05-01-preview',
    'https://myproj.eastus.models.ai.azure.com#chat',
  ])('resolves %s to the account in the deployment group', (endpoint) => {
    const reference = parseExistingEndpoint(endpoint, makeContext());

    expect(reference).toEqual({
      kind: 'existing',
      reference: {
        logicalName: 'aiServices',
        name: 'myproj',
        id: accountId(SUBSCRIPTION_ID, 'rg-demo1'),
        endpoint: 'https://myproj.eastus.models.ai.azure.com/models',
      },
      subscriptionId: SUBSCRIPTION_ID,
      resourceGroupName: 'rg-demo1',
      scope: 'same-group',
    });
  });

  test('honours subscription and group overrides', () => {
    const reference = parseExistingEndpoint(
      'https://myproj.eastus.models.ai.azure.com/models',
      makeContext(),
      { subscriptionId: OTHER_SUBSCRIPTION_ID, resourceGroupName: 'rg-shared' },
    );

    expect(reference.kind).toBe('existing');
    if (reference.kind !== 'existing') return;
    expect(reference.reference.id).toBe(accountId(OTHER_SUBSCRIPTION_ID, 'rg-shared'));
    expect(reference.scope).toBe('cross-subscription');
  });

  test.each([
    ['myproj.eastus.models.ai.azure.com', "missing scheme separator '://'"],
    ['https:///models', 'missing host name'],
    ['https://-bad.example.com', "'-bad' is not a valid account name"],
  ])('marks %s as broken', (endpoint, reason) => {
    expect(parseExistingEndpoint(endpoint, makeContext())).toEqual({
      kind: 'broken',
      input: endpoint,
      reason,
    });
  });

  test('classifies scopes case-insensitively', () => {
    const context = makeContext();
    expect(classifyScope(context, SUBSCRIPTION_ID.toUpperCase(), 'RG-DEMO1')).toBe('same-group');
    expect(classifyScope(context, SUBSCRIPTION_ID, 'rg-shared')).toBe('cross-group');
    expect(classifyScope(context, OTHER_SUBSCRIPTION_ID, 'rg-demo1')).toBe('cross-subscription');
  });
});

describe('setup choice', () => {
  test('an endpoint forces the existing setup', () => {
    expect(
      resolveSetupChoice({ aiSetup: 'new', existingAiEndpoint: 'https://myproj.example.com' }),
    ).toEqual({ setup: 'existing' });
  });

  test('the flag decides without an endpoint', () => {
    expect(resolveSetupChoice({ aiSetup: 'new', existingAiEndpoint: undefined })).toEqual({
      setup: 'new',
    });
  });

  test('existing without an endpoint is an issue', () => {
    expect(resolveSetupChoice({ aiSetup: 'existing', existingAiEndpoint: undefined })).toEqual({
      setup: 'existing',
      issue: { field: 'existingAiEndpoint', message: "is required when aiSetup is 'existing'" },
    });
  });
});

describe('derived settings', () => {
  test('defaults to a new account with both models and no warnings', () => {
    const derived = makeDerived();

    expect(derived.setup).toBe('new');
    expect(derived.ai.kind).toBe('new');
    expect(derived.aiLocation).toBe('eastus');
    expect(derived.requestedModels.chat.name).toBe('gpt-4o-mini');
    expect(derived.requestedModels.audio?.name).toBe('gpt-4o-mini-audio-preview');
    expect(derived.user).toBeUndefined();
    expect(derived.issues).toEqual([]);
    expect(derived.warnings).toEqual([]);
  });

  test('tracing requires monitoring', () => {
    const derived = makeDerived({ enableTracing: 'true' });

    expect(derived.flags.tracing).toBe(false);
    expect(derived.warnings).toEqual(['enableTracing is ignored because monitoring is disabled']);
    expect(makeDerived({ enableTracing: 'true', enableMonitoring: 'true' }).flags.tracing).toBe(
      true,
    );
  });

  test('warns about ignored existing-account overrides on a new setup', () => {
    expect(makeDerived({ existingAiResourceGroup: 'rg-shared' }).warnings).toEqual([
      'existingAiSubscriptionId/existingAiResourceGroup are ignored for a new AI setup',
    ]);
  });

  test('warns when the supplied key has nowhere to go', () => {
    expect(makeDerived({}, { hasExistingAiKey: true }).warnings).toEqual([
      'existingAiKey is ignored; it is only stored for an existing AI setup with Key Vault enabled',
    ]);
  });

  test('warns when the web app ends up without a credential', () => {
    expect(makeDerived({ enableManagedIdentity: 'false' }).warnings).toEqual([
      'managed identity is disabled and no key is stored; the web app has no credential for the AI endpoint',
    ]);
  });

  test('a key behind Key Vault needs the web app identity', () => {
    const derived = makeDerived(
      {
        existingAiEndpoint: 'https://myproj.eastus.models.ai.azure.com/models',
        enableKeyVault: 'true',
        enableManagedIdentity: 'false',
      },
      { hasExistingAiKey: true },
    );

    expect(derived.storesExistingAiKey).toBe(false);
    expect(derived.warnings).toEqual([
      'existingAiKey is ignored; a Key Vault reference needs the web app managed identity',
      'managed identity is disabled and no key is stored; the web app has no credential for the AI endpoint',
    ]);
  });

  test('stores the key for an existing account with Key Vault and an identity', () => {
    const derived = makeDerived(
      {
        existingAiEndpoint: 'https://myproj.eastus.models.ai.azure.com/models',
        enableKeyVault: 'true',
      },
      { hasExistingAiKey: true },
    );

    expect(derived.storesExistingAiKey).toBe(true);
    expect(derived.warnings).toEqual([]);
  });

  test('rejects an audio model that repeats the chat model', () => {
    const derived = makeDerived({ chatModelName: 'gpt-4o', audioModelName: 'GPT-4o' });

    expect(derived.issues).toEqual([
      { field: 'audioModelName', message: 'must differ from chatModelName' },
    ]);
    expect(derived.requestedModels.audio).toBeUndefined();
  });

  test('records a broken endpoint as an issue', () => {
    const derived = makeDerived({ existingAiEndpoint: 'myproj.eastus.models.ai.azure.com' });

    expect(derived.setup).toBe('existing');
    expect(derived.ai.kind).toBe('broken');
    expect(derived.issues).toEqual([
      {
        field: 'existingAiEndpoint',
        message: "is not a valid endpoint URL (missing scheme separator '://')",
      },
    ]);
  });

  test('carries the deploying principal and an explicit AI region', () => {
    const derived = makeDerived({
      principalId: USER_PRINCIPAL_ID,
      principalType: 'ServicePrincipal',
      aiLocation: 'swedencentral',
    });

    expect(derived.user).toEqual({ id: USER_PRINCIPAL_ID, type: 'ServicePrincipal' });
    expect(derived.aiLocation).toBe('swedencentral');
  });
});
