import 'dotenv/config';
import { errorMeta, StoreUnavailableError } from '../src/lib/ingest/errors';
import { main } from './ingest';

main().catch((error) => {
  console.error(
    JSON.stringify({
      level: 'error',
      message: 'ingest.run.failure',
      meta: {
        ...errorMeta(error, 'INGEST_FAILED'),
        ...(error instanceof StoreUnavailableError ? { stats: error.stats } : {}),
      },
    }),
  );
  process.exitCode = 1;
});
