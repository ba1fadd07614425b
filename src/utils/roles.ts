// Built-in Azure role definition ids.
export const roles = {
  cognitiveServicesOpenAiUser: {
    name: 'Cognitive Services OpenAI User',
    id: '5e0bd9bd-7b93-4f28-af87-19fc36ad61bd',
  },
  cognitiveServicesUser: {
    name: 'Cognitive Services User',
    id: 'a97b65f3-24c7-4388-baec-2e87135dc908',
  },
  azureAiUser: {
    name: 'Azure AI User',
    id: '53ca6127-db72-4b80-b1b0-d745d6d5456d',
  },
  storageBlobDataContributor: {
    name: 'Storage Blob Data Contributor',
    id: 'ba92f5b4-2d11-453d-a403-e96b0029c9fe',
  },
  keyVaultSecretsUser: {
    name: 'Key Vault Secrets User',
    id: '4633458b-17de-408a-b874-0445c86b69e6',
  },
  keyVaultSecretsOfficer: {
    name: 'Key Vault Secrets Officer',
    id: 'b86a8fe4-44ce-4948-aee5-eccb2c155cd7',
  },
  searchIndexDataContributor: {
    name: 'Search Index Data Contributor',
    id: '8ebe5a00-799e-43f5-93ac-243d3dce84a7',
  },
  monitoringMetricsPublisher: {
    name: 'Monitoring Metrics Publisher',
    id: '3913510d-42f4-4e42-8a64-420c390055eb',
  },
} as const;

export type RoleKey = keyof typeof roles;

export const roleDefinitionResourceId = (subscriptionId: string, roleId: string) =>
  `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${roleId}`;
