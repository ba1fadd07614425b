import { z } from 'zod';
import { ParameterValidationError } from './errors';

/**
 * The subset of `pulumi.Config` the intake reads through. Every value
 * arrives as an optional string.
 */
export interface ConfigSource {
  get(key: string): string | undefined;
}

// Empty or whitespace-only values count as "not supplied".
const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
};

const text = (pattern?: RegExp, message?: string) =>
  z.preprocess(
    blankToUndefined,
    pattern ? z.string().regex(pattern, message).optional() : z.string().optional(),
  );

const textWithDefault = (defaultValue: string, pattern?: RegExp, message?: string) =>
  text(pattern, message).transform((value) => value ?? defaultValue);

const flag = (defaultValue: boolean) =>
  z
    .preprocess(
      (value) => {
        const normalized = blankToUndefined(value);
        return typeof normalized === 'string' ? normalized.toLowerCase() : normalized;
      },
      z.enum(['true', 'false'], {
        errorMap: () => ({ message: "must be 'true' or 'false'" }),
      }).optional(),
    )
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

const capacity = (defaultValue: number) =>
  text(/^\d+$/, 'must be a whole number')
    .transform((value) => (value === undefined ? defaultValue : Number(value)))
    .pipe(z.number().int().min(1).max(1000));

const guid = text(
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/,
  'must be a GUID',
);

const resourceName = text(
  /^[a-zA-Z0-9][a-zA-Z0-9-]{0,58}[a-zA-Z0-9]$/,
  'must be 2-60 letters, digits or hyphens',
);

const regionName = /^[a-z0-9]+$/;

export const deploymentParametersSchema = z.object({
  environmentName: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: 'is required' })
      .regex(/^[a-zA-Z0-9-]{1,64}$/, 'must be 1-64 letters, digits or hyphens'),
  ),
  location: z.preprocess(
    blankToUndefined,
    z
      .string({ required_error: 'is required' })
      .regex(regionName, 'must be an Azure region name such as eastus'),
  ),
  aiLocation: text(regionName, 'must be an Azure region name such as eastus'),
  resourceGroupName: text(
    /^[-\w.()]{0,89}[-\w()]$/,
    'must be 1-90 characters and not end with a period',
  ),

  aiSetup: z
    .preprocess(blankToUndefined, z.enum(['new', 'existing']).optional())
    .transform((value) => value ?? 'new'),
  existingAiEndpoint: text(),
  existingAiSubscriptionId: guid,
  existingAiResourceGroup: text(/^[-\w.()]{0,89}[-\w()]$/, 'is not a valid resource group name'),

  chatModelName: textWithDefault('gpt-4o-mini'),
  chatModelFormat: textWithDefault('OpenAI'),
  chatModelVersion: textWithDefault('2024-07-18'),
  chatModelSkuName: textWithDefault('GlobalStandard'),
  chatModelCapacity: capacity(10),
  // An empty audio model name turns the audio deployment off.
  audioModelName: z
    .preprocess((value) => (typeof value === 'string' ? value.trim() : value), z.string().optional())
    .transform((value) => (value === undefined ? 'gpt-4o-mini-audio-preview' : value)),
  audioModelFormat: textWithDefault('OpenAI'),
  audioModelVersion: textWithDefault('2024-12-17'),
  audioModelSkuName: textWithDefault('GlobalStandard'),
  audioModelCapacity: capacity(10),

  aiServicesName: text(
    /^[a-zA-Z0-9][a-zA-Z0-9-]{0,62}[a-zA-Z0-9]$/,
    'must be 2-64 letters, digits or hyphens',
  ),
  storageAccountName: text(/^[a-z0-9]{3,24}$/, 'must be 3-24 lowercase letters or digits'),
  appServicePlanName: resourceName,
  appServiceName: resourceName,
  logAnalyticsName: resourceName,
  applicationInsightsName: resourceName,
  keyVaultName: text(
    /^[a-zA-Z][a-zA-Z0-9-]{1,22}[a-zA-Z0-9]$/,
    'must be 3-24 characters and start with a letter',
  ),
  searchServiceName: text(
    /^[a-z0-9][a-z0-9-]{0,58}[a-z0-9]$/,
    'must be 2-60 lowercase letters, digits or hyphens',
  ),

  appServiceSku: textWithDefault('B1'),
  pythonVersion: textWithDefault('3.11', /^\d+\.\d+$/, "must look like '3.11'"),

  enableManagedIdentity: flag(true),
  enableMonitoring: flag(false),
  enableTracing: flag(false),
  enableContentRecording: flag(false),
  enableKeyVault: flag(false),
  enableSearch: flag(false),

  principalId: guid,
  principalType: z
    .preprocess(blankToUndefined, z.enum(['User', 'ServicePrincipal']).optional())
    .transform((value) => value ?? 'User'),

  validationSeed: text(),
});

export type DeploymentParameters = z.infer<typeof deploymentParametersSchema> & {
  hasExistingAiKey: boolean;
};

export const PARAMETER_KEYS = deploymentParametersSchema.keyof().options;

export const parseParameters = (
  raw: Record<string, string | undefined>,
  options: { hasExistingAiKey?: boolean } = {},
): DeploymentParameters => {
  const result = deploymentParametersSchema.safeParse(raw);
  if (!result.success) {
    throw new ParameterValidationError(
      result.error.issues.map((issue) => ({
        field: String(issue.path[0] ?? 'parameters'),
        message: issue.message,
      })),
    );
  }
  return { ...result.data, hasExistingAiKey: options.hasExistingAiKey ?? false };
};

export const readParameters = (
  source: ConfigSource,
  options: { hasExistingAiKey?: boolean } = {},
): DeploymentParameters => {
  const raw: Record<string, string | undefined> = {};
  for (const key of PARAMETER_KEYS) {
    raw[key] = source.get(key);
  }
  return parseParameters(raw, options);
};
