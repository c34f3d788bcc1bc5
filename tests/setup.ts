import { createLogger, setLogger } from '../src/infra/logger.js';

// Modules log through the shared instance; tests keep it silent
setLogger(createLogger({ NODE_ENV: 'test', LOG_LEVEL: 'error', LOG_FILE: undefined }));
