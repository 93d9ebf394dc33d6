import { config } from './config.js';
import { createApp } from './app.js';
import { log } from './logger.js';

createApp().listen(config.port, () => {
  log.info('server', `Protocol Scout API running on http://localhost:${config.port}`);
});
