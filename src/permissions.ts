/**
 * Dataset permission checks
 *
 * Tenant match is always required. Beyond that, workspace owners see every
 * dataset; everyone else is bound by the dataset's visibility scope.
 */

import { errors } from './errors';
import type { KnowledgeStore } from './knowledgeStore';
import type { Dataset, Principal } from './types';
import { logWarn } from './utils';

export async function checkDatasetPermission(
  store: Pick<KnowledgeStore, 'hasDatasetPermission'>,
  dataset: Dataset,
  principal: Principal
): Promise<void> {
  if (dataset.tenantId !== principal.tenantId) {
    logWarn('Dataset access denied: tenant mismatch', { datasetId: dataset.id });
    throw errors.forbidden('You do not have permission to access this dataset.');
  }

  if (principal.role === 'owner') return;

  switch (dataset.permission) {
    case 'all_team_members':
      return;
    case 'only_me':
      if (dataset.createdBy !== principal.accountId) {
        logWarn('Dataset access denied: only_me', { datasetId: dataset.id });
        throw errors.forbidden('You do not have permission to access this dataset.');
      }
      return;
    case 'partial_members': {
      if (dataset.createdBy === principal.accountId) return;
      const granted = await store.hasDatasetPermission(dataset.id, principal.accountId, principal.tenantId);
      if (!granted) {
        logWarn('Dataset access denied: no grant', { datasetId: dataset.id });
        throw errors.forbidden('You do not have permission to access this dataset.');
      }
      return;
    }
  }
}
