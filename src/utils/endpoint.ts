export type EndpointParseResult =
  | { ok: true; accountName: string; endpoint: string }
  | { ok: false; reason: string };

const MODELS_SUFFIX = '/models';

/**
 * Splits an AI inference endpoint such as
 * `https://myproj.eastus.models.ai.azure.com/models` into the account name
 * (first DNS label of the host) and the normalized `/models` endpoint.
 * A trailing `/models` segment is optional on input; a query string or
 * fragment is dropped.
 */
export const parseAiEndpoint = (input: string): EndpointParseResult => {
  const trimmed = input.trim();
  const separator = trimmed.indexOf('://');
  if (separator <= 0) {
    return { ok: false, reason: "missing scheme separator '://'" };
  }

  const scheme = trimmed.slice(0, separator).toLowerCase();
  if (!/^[a-z][a-z0-9+.-]*$/.test(scheme)) {
    return { ok: false, reason: `invalid scheme '${scheme}'` };
  }

  let rest = trimmed.slice(separator + 3).replace(/\/+$/, '');
  if (rest.toLowerCase().endsWith(MODELS_SUFFIX)) {
    rest = rest.slice(0, -MODELS_SUFFIX.length).replace(/\/+$/, '');
  }

  // Path, query and fragment never reach the normalized endpoint.
  const authority = rest.split(/[/?#]/)[0].toLowerCase();
  const host = authority.split(':')[0];
  if (!host) {
    return { ok: false, reason: 'missing host name' };
  }

  const accountName = host.split('.')[0];
  if (!/^[a-z0-9][a-z0-9-]*$/.test(accountName)) {
    return { ok: false, reason: `'${accountName}' is not a valid account name` };
  }

  return {
    ok: true,
    accountName,
    endpoint: `${scheme}://${authority}${MODELS_SUFFIX}`,
  };
};

export const newAiServicesEndpoint = (accountName: string) =>
  `https://${accountName}.services.ai.azure.com${MODELS_SUFFIX}`;
