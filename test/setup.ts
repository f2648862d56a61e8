import { configureLogger } from '../src/core/logging/index.js';

configureLogger({ level: 'silent' });
