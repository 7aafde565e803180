import { Logger } from '@nestjs/common';
import { CorrelationStore, PersistenceError } from '../interfaces';
import { OneShotTask, TaskKind } from '../scheduler';
import { TsaProfile } from '../timestamp';

/**
 * Runs once before ingestion: the store must answer, the TSA profile is logged
 */
export function createStartupCheckTask(
  store: CorrelationStore,
  profile: TsaProfile,
): OneShotTask {
  const logger = new Logger('StartupCheck');

  return {
    kind: TaskKind.ONE_SHOT,
    name: 'startup-check',
    run: async () => {
      if (!(await store.isHealthy())) {
        throw new PersistenceError('Correlation store is not reachable', 'health-check');
      }

      const serials = profile.trustAnchors.map((anchor) =>
        Buffer.from(anchor.serialNumber.valueBlock.valueHexView).toString('hex'),
      );
      logger.log(
        `Timestamping with ${profile.url} (${profile.digestAlgorithm}), trust anchor serials: ${serials.join(', ') || 'none'}`,
      );
    },
  };
}
