import { Repositories } from './interfaces';
import { TransactionRepository } from './TransactionRepository';
import { DelegatorRepository } from './DelegatorRepository';
import { ValidatorRepository } from './ValidatorRepository';
import { EpochSyncRepository } from './EpochSyncRepository';
import { EpochDataRepository } from './EpochDataRepository';

export * from './interfaces';

export function mongoRepositories(): Repositories {
  return {
    transactions: TransactionRepository.getInstance(),
    delegators: DelegatorRepository.getInstance(),
    validators: ValidatorRepository.getInstance(),
    epochSync: EpochSyncRepository.getInstance(),
    epochData: EpochDataRepository.getInstance()
  };
}
