import { defaultTolerances } from '../config/tolerances';
import type { MatchingTolerances } from '../matching';
import { createInMemoryRepositories, type Repositories } from '../repositories';
import { ImportService } from './import.service';
import { ImportPatternService } from './importPattern.service';
import { ManualLinkService } from './manualLink.service';
import { ReconciliationService } from './reconciliation.service';
import { TransactionService } from './transaction.service';

export { healthService, HealthService } from './health.service';
export * from './reconciliation.service';
export * from './manualLink.service';
export * from './import.service';
export * from './importPattern.service';
export * from './transaction.service';

export interface Services {
  repositories: Repositories;
  tolerances: MatchingTolerances;
  reconciliation: ReconciliationService;
  manualLinks: ManualLinkService;
  imports: ImportService;
  importPatterns: ImportPatternService;
  transactions: TransactionService;
}

/**
 * Wires the services around one set of repositories and tolerances.
 */
export function createServices(
  repositories: Repositories = createInMemoryRepositories(),
  tolerances: MatchingTolerances = defaultTolerances
): Services {
  const reconciliation = new ReconciliationService(repositories, tolerances);

  return {
    repositories,
    tolerances,
    reconciliation,
    manualLinks: new ManualLinkService(repositories),
    imports: new ImportService(repositories, reconciliation, tolerances),
    importPatterns: new ImportPatternService(repositories),
    transactions: new TransactionService(repositories, reconciliation),
  };
}
