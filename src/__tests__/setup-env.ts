import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';

for (const key of Object.keys(process.env)) {
  if (key.startsWith('SHOPLINE_')) delete process.env[key];
}

// Never touch the real ~/.shopline from tests.
process.env.SHOPLINE_CONFIG_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'spl-test-config-'));
process.env.SHOPLINE_SECRET_PASSPHRASE = 'test-passphrase';

chalk.level = 0;
