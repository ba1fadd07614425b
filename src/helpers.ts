// Copyright 2016-2025, Pulumi Corporation.  All rights reserved.

import * as resources from '@pulumi/azure-native/resources';
import * as pulumi from '@pulumi/pulumi';
import { EXPORT_KEYS, ExportedConfig, isDeferred } from './exports';
import { DeferredKey } from './types';

export interface StackScope {
  resourceGroup: resources.ResourceGroup;
  location: string;
  tags: Record<string, string>;
}

export type DeferredOutputs = Record<DeferredKey, pulumi.Input<string>>;

export type ResolvedExports = Record<string, string | boolean>;

export const settingValue = (value: string | boolean) =>
  typeof value === 'boolean' ? String(value) : value;

/** Replaces deploy-time placeholders in the export surface with real outputs. */
export function resolveExports(
  exported: ExportedConfig,
  deferred: DeferredOutputs,
): pulumi.Output<ResolvedExports> {
  const values: pulumi.Input<string | boolean>[] = EXPORT_KEYS.map((key) => {
    const value = exported[key];
    return isDeferred(value) ? deferred[value.deferred] : value;
  });
  return pulumi.all(values).apply((resolved) => {
    const result: ResolvedExports = {};
    EXPORT_KEYS.forEach((key, index) => {
      result[key] = resolved[index];
    });
    return result;
  });
}

export function toAppSettings(
  exported: pulumi.Output<ResolvedExports>,
  runtimeSettings: Record<string, string>,
): pulumi.Output<Record<string, string>> {
  return exported.apply((values) => {
    const result: { [k: string]: string } = { ...runtimeSettings };
    Object.entries(values).forEach(([name, value]) => {
      result[name] = settingValue(value);
    });
    return result;
  });
}

export function stackOutputs(
  exported: pulumi.Output<ResolvedExports>,
): Record<string, pulumi.Output<string | boolean>> {
  const outputs: Record<string, pulumi.Output<string | boolean>> = {};
  EXPORT_KEYS.forEach((key) => {
    outputs[key] = exported.apply((values) => values[key]);
  });
  return outputs;
}
