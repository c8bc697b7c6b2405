import { createApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Contour analysis server running on port ${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
});
