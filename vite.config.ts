import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ServerOptions as HttpsServerOptions } from 'node:https';

import react from '@vitejs/plugin-react';
import { defineConfig, loadEnv } from 'vite';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig(({ mode }) => {
  const env = loadEnv(mode, rootDir, '');
  const httpsOptions = resolveHttpsOptions(env);

  return {
    envDir: rootDir,
    plugins: [react()],
    server: {
      host: true,
      https: httpsOptions,
    },
    preview: {
      host: true,
      https: httpsOptions,
    },
  };
});

function resolveHttpsOptions(env: Record<string, string>): HttpsServerOptions | undefined {
  const certPath = env.VITE_DEV_HTTPS_CERT;
  const keyPath = env.VITE_DEV_HTTPS_KEY;
  if (!certPath || !keyPath) {
    return undefined;
  }
  return {
    cert: fs.readFileSync(resolveFilePath(certPath, 'VITE_DEV_HTTPS_CERT')),
    key: fs.readFileSync(resolveFilePath(keyPath, 'VITE_DEV_HTTPS_KEY')),
  };
}

function resolveFilePath(target: string, envKey: string): string {
  const resolved = path.resolve(target);
  if (!fs.existsSync(resolved)) {
    throw new Error(`${envKey} -> file does not exist: ${resolved}`);
  }
  return resolved;
}
