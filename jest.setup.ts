import { getLogger } from './src/utils/logger';

// Keep structured log lines out of the test output
getLogger().setOutputStream(() => {});
