import { ParameterValidationError } from '../src/errors';
import { evaluateDeployment } from '../src/pipeline';
import { makeContext, makeParams, USER_PRINCIPAL_ID } from './fixtures';

const EXISTING_ENDPOINT = 'https://myproj.eastus.models.ai.azure.com/models';

describe('deployment evaluation', () => {
  test('plans a fresh environment end to end', () => {
    const context = makeContext();
    const { plan, access, exports, trace } = evaluateDeployment(context, makeParams());
    const token = context.resourceToken;

    expect(exports.AZURE_INFERENCE_ENDPOINT).toBe(`https://cog-${token}.services.ai.azure.com/models`);
    expect(plan.ai.deployments.map((deployment) => deployment.name)).toEqual([
      'gpt-4o-mini',
      'gpt-4o-mini-audio-preview',
    ]);
    expect(access.bindings).toHaveLength(3);
    expect(trace).toEqual({
      resourceToken: token,
      seeded: false,
      setup: 'new',
      aiStatus: 'provisioned',
      names: expect.objectContaining({ aiServices: `cog-${token}`, storageAccount: `st${token}` }),
      subsystems: {
        managedIdentity: true,
        monitoring: false,
        tracing: false,
        contentRecording: false,
        keyVault: false,
        search: false,
      },
      resources: plan.resources.map((resource) => resource.key),
      models: { deployed: ['gpt-4o-mini', 'gpt-4o-mini-audio-preview'], dropped: [] },
      bindings: access.bindings.map((binding) => ({
        name: binding.name,
        principal: 'compute',
        role: binding.roleName,
        target: binding.target.name,
        scope: 'same-group',
      })),
      skippedBindings: [
        { principal: 'user', roleName: 'all', target: 'all', reason: 'no principalId supplied' },
      ],
      warnings: [],
    });
  });

  test('references an existing account without provisioning one', () => {
    const context = makeContext({ environmentName: 'demo2', resourceGroupName: 'rg-demo2' });
    const { plan, exports, trace } = evaluateDeployment(
      context,
      makeParams({
        environmentName: 'demo2',
        existingAiEndpoint: EXISTING_ENDPOINT,
        principalId: USER_PRINCIPAL_ID,
      }),
    );

    expect(trace.setup).toBe('existing');
    expect(trace.aiStatus).toBe('referenced');
    expect(exports.AZURE_AI_SERVICES_NAME).toBe('myproj');
    expect(exports.AZURE_AI_SERVICES_ID).toContain('/accounts/myproj');
    expect(exports.AZURE_RESOURCE_GROUP).toBe('rg-demo2');
    expect(
      plan.resources.filter(
        (resource) => resource.kind === 'aiServicesAccount' || resource.kind === 'modelDeployment',
      ),
    ).toEqual([]);
    expect(trace.bindings.filter((binding) => binding.target === 'myproj')).toHaveLength(3);
  });

  test('an endpoint wins over aiSetup=new', () => {
    const { trace } = evaluateDeployment(
      makeContext(),
      makeParams({ aiSetup: 'new', existingAiEndpoint: EXISTING_ENDPOINT }),
    );
    expect(trace.setup).toBe('existing');
  });

  test('rejects a malformed endpoint by default', () => {
    const evaluate = () =>
      evaluateDeployment(makeContext(), makeParams({ existingAiEndpoint: 'myproj.example.com' }));

    expect(evaluate).toThrow(ParameterValidationError);
    expect(evaluate).toThrow(
      "Invalid deployment parameters (existingAiEndpoint: is not a valid endpoint URL (missing scheme separator '://'))",
    );
  });

  test('rejects an existing setup without an endpoint', () => {
    try {
      evaluateDeployment(makeContext(), makeParams({ aiSetup: 'existing' }));
      throw new Error('expected evaluation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ParameterValidationError);
      if (error instanceof ParameterValidationError) {
        expect(error.field).toBe('existingAiEndpoint');
      }
    }
  });

  test('rejects the same model name for chat and audio', () => {
    const evaluate = () =>
      evaluateDeployment(
        makeContext(),
        makeParams({ chatModelName: 'gpt-4o', audioModelName: 'gpt-4o' }),
      );

    expect(evaluate).toThrow(
      'Invalid deployment parameters (audioModelName: must differ from chatModelName)',
    );
  });

  test('plans each model deployment once when not strict', () => {
    const { plan } = evaluateDeployment(
      makeContext(),
      makeParams({ chatModelName: 'gpt-4o', audioModelName: 'gpt-4o' }),
      { strict: false },
    );
    const keys = plan.resources.map((resource) => resource.key);

    expect(keys.filter((key) => key.startsWith('modelDeployment:'))).toEqual([
      'modelDeployment:gpt-4o',
    ]);
    expect(new Set(keys).size).toBe(keys.length);
  });

  test('plans around a broken reference when not strict', () => {
    const { trace } = evaluateDeployment(
      makeContext(),
      makeParams({ existingAiEndpoint: 'myproj.example.com' }),
      { strict: false },
    );

    expect(trace.aiStatus).toBe('broken-reference');
    expect(trace.bindings.map((binding) => binding.role)).toEqual([
      'Storage Blob Data Contributor',
    ]);
  });

  test('is deterministic and seedable', () => {
    const first = evaluateDeployment(makeContext(), makeParams()).trace;
    const second = evaluateDeployment(makeContext(), makeParams()).trace;
    const seeded = evaluateDeployment(makeContext({ seed: 'test-seed' }), makeParams()).trace;

    expect(second).toEqual(first);
    expect(seeded.seeded).toBe(true);
    expect(seeded.resourceToken).not.toBe(first.resourceToken);
  });
});
