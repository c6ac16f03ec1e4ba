import 'dotenv/config';
import { run } from './bootstrap/main.js';
import { createLogger, errorMessage } from './infra/logger/logger.js';

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    createLogger({ logging: { level: 'error', color: true } }).error('bootstrap', errorMessage(err));
    process.exitCode = 1;
  });
