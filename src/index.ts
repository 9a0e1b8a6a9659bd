/**
 * Server entry point - initializes and starts the Express application
 */
import { pathToFileURL } from 'url';
import { createApp } from './app';
import { config } from './config/index';

export interface BannerOptions {
  title: string;
  port: number;
  provider: string;
  model: string;
  throttleMs: number;
  cacheTtlMs: number;
  database: boolean;
}

/**
 * Builds the boxed start-up banner, one string per line
 */
export const generateBanner = (options: BannerOptions): string[] => {
  const reset = '\x1b[0m';
  const bright = '\x1b[1m';
  const dim = '\x1b[2m';
  const green = '\x1b[32m';
  const cyan = '\x1b[36m';
  const yellow = '\x1b[33m';
  const blue = '\x1b[34m';
  const magenta = '\x1b[35m';

  const boxWidth = 55;
  const contentWidth = boxWidth - 6;

  const getVisibleWidth = (text: string): number => {
    const ansiRegex = new RegExp(`${'\x1b'}\\[[0-9;]*m`, 'g');
    return [...text.replace(ansiRegex, '')].length;
  };

  const padRight = (text: string, width: number): string => {
    return text + ' '.repeat(Math.max(0, width - getVisibleWidth(text)));
  };

  const createLine = (content: string): string => {
    return `${bright}${green}║${reset}  ${padRight(content, contentWidth)}  ${bright}${green}║${reset}`;
  };

  const topBorder = `${bright}${green}╔${'═'.repeat(boxWidth - 2)}╗${reset}`;
  const divider = `${bright}${green}╠${'═'.repeat(boxWidth - 2)}╣${reset}`;
  const bottomBorder = `${bright}${green}╚${'═'.repeat(boxWidth - 2)}╝${reset}`;

  const lines: string[] = [];
  lines.push('');
  lines.push(topBorder);
  lines.push(createLine(`${bright}${cyan}${options.title}${reset}`));
  lines.push(divider);
  lines.push(createLine(`${dim}Status:${reset}     ${bright}${green}Running${reset}`));
  lines.push(createLine(`${dim}Port:${reset}       ${bright}${yellow}${options.port}${reset}`));
  lines.push(createLine(`${dim}Provider:${reset}   ${bright}${blue}${options.provider}${reset}`));
  lines.push(createLine(`${dim}Model:${reset}      ${bright}${magenta}${options.model}${reset}`));
  lines.push(
    createLine(`${dim}Throttle:${reset}   ${bright}${yellow}${options.throttleMs}${reset} ms between calls`)
  );
  lines.push(
    createLine(`${dim}Cache TTL:${reset}  ${bright}${yellow}${options.cacheTtlMs / 1000}${reset} s`)
  );
  lines.push(
    createLine(
      `${dim}Database:${reset}   ${options.database ? `${green}configured` : `${yellow}not configured`}${reset}`
    )
  );
  lines.push(bottomBorder);
  lines.push('');

  return lines;
};

const isMainModule =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

// Only start server if this file is run directly (not imported in tests)
if (isMainModule) {
  const { app, services } = await createApp();
  const { port } = config.server;

  const server = app.listen(port, () => {
    const banner = generateBanner({
      title: 'SERAPH Relay',
      port,
      provider: services.provider.name,
      model: services.provider.model,
      throttleMs: config.throttle.minIntervalMs,
      cacheTtlMs: config.cache.ttlMs,
      database: services.store.isConfigured,
    });
    banner.forEach((line) => console.log(line));

    services.logger.info(`Server started successfully on port ${port}`);
    services.logger.info(`Log level: ${config.logging.logLevel}`);
    services.logger.info(
      `Completion provider: ${services.provider.name} (model: ${services.provider.model}, ` +
        `key configured: ${services.provider.isConfigured})`
    );
    services.logger.info(`Database configured: ${services.store.isConfigured}`);
  });

  // Graceful shutdown
  const cleanup = (): void => {
    services.logger.info('Server shutting down');
    server.close();
    void services.store
      .close()
      .catch((error: unknown) => services.logger.error('Failed to close database pool', error))
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', cleanup);
  process.on('SIGINT', cleanup);
}
