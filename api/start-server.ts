import path from 'path';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { loadConfig } from './config';
import { createApp } from './express';
import { createServices } from './services/container';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const envPath = path.resolve(__dirname, '..', '.env');
const result = dotenv.config({ path: envPath });
if (result.error) {
  console.warn(`.env not loaded from ${envPath}:`, result.error.message || result.error);
} else {
  console.log(`Loaded .env from ${envPath}`);
}

const config = loadConfig();
const app = createApp(createServices(config.dataDir), config);

app.listen(config.port, () => {
  console.log('\n' + '='.repeat(60));
  console.log('Annotation Server Started');
  console.log('='.repeat(60));
  console.log('Port:', config.port);
  console.log('Data directory:', config.dataDir);
  console.log('CORS origin:', config.corsOrigin);
  console.log('Upload limit:', config.uploadLimitMb, 'MB');
  console.log('='.repeat(60) + '\n');
});
