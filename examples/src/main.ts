import { toError } from '@switchyard/common';
import { readEnv, SwitchyardHttpServer } from '@switchyard/http-adapter';
import { Logger } from '@switchyard/logger';

import { createApp } from './app';

async function bootstrap(): Promise<void> {
  const env = readEnv(process.env);

  Logger.configure(env.logger);

  const logger = new Logger('Bootstrap');
  const { kernel, errorRenderer } = createApp({ options: env.kernel });
  const server = new SwitchyardHttpServer(kernel, { bodyLimit: env.server.bodyLimit, errorRenderer });
  const address = await server.listen(env.server.port, env.server.host);

  logger.info(`Listening on ${address.address}:${address.port}`);

  const shutdown = (): void => {
    server.close().catch((error: unknown) => {
      logger.error('Failed to close the server', toError(error));
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').fatal('Failed to start', toError(error));
  process.exitCode = 1;
});
