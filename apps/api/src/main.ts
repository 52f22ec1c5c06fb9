import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import {
  API_DEFAULT_HOST,
  API_DEFAULT_PORT,
  API_DOCS_PATH,
  API_GLOBAL_PREFIX,
  API_PREFIX_PATH,
  HTTP_SLOW_REQUEST_THRESHOLD_MS,
} from './app.constants';
import { readAppMeta } from './app.meta';
import { AppModule } from './app.module';
import { ensureBootstrapEnv } from './bootstrap-env';
import { BufferedLogger } from './logs/buffered-logger';
import { createHttpLoggingMiddleware } from './logs/http-logging.middleware';
import {
  createSecurityHeadersMiddleware,
  noStoreMiddleware,
} from './security/security-headers.middleware';

function parseTrustProxyEnv(
  raw: string | undefined,
): boolean | number | string | undefined {
  const value = raw?.trim();
  if (!value) return undefined;

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === 'yes' || lower === 'on') return true;
  if (lower === 'false' || lower === 'no' || lower === 'off') return false;
  if (/^\d+$/.test(value)) return Number.parseInt(value, 10);

  // Express presets such as "loopback" or a CIDR list.
  return value;
}

async function bootstrap() {
  const { dataDir } = await ensureBootstrapEnv();
  const bootstrapLogger = new Logger('Bootstrap');

  process.on('unhandledRejection', (reason) => {
    bootstrapLogger.error(`Unhandled rejection: ${String(reason)}`);
  });

  const app = await NestFactory.create(AppModule, {
    logger: new BufferedLogger(),
  });
  app.enableShutdownHooks();

  const trustProxy = parseTrustProxyEnv(process.env.TRUST_PROXY);
  if (trustProxy !== undefined) {
    const httpAdapter = app.getHttpAdapter();
    (
      httpAdapter.getInstance() as { set?: (k: string, v: unknown) => void }
    )?.set?.('trust proxy', trustProxy);
  }

  app.use(
    createSecurityHeadersMiddleware({
      docsPath: API_DOCS_PATH,
      hsts: process.env.NODE_ENV === 'production',
    }),
  );
  app.use(API_PREFIX_PATH, noStoreMiddleware);
  app.setGlobalPrefix(API_GLOBAL_PREFIX);

  // Same-origin by default; a separate control panel is allowed through CORS_ORIGINS.
  const corsOrigins = (process.env.CORS_ORIGINS ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  if (corsOrigins.length > 0) {
    app.enableCors({ origin: corsOrigins });
  }

  const httpLoggingEnabled =
    process.env.HTTP_LOGGING === 'true' ||
    process.env.NODE_ENV !== 'production';
  if (httpLoggingEnabled) {
    app.use(
      createHttpLoggingMiddleware({
        logger: new Logger('HTTP'),
        slowThresholdMs: HTTP_SLOW_REQUEST_THRESHOLD_MS,
      }),
    );
  }

  const swaggerEnabled =
    process.env.SWAGGER_ENABLED === 'true' ||
    process.env.NODE_ENV !== 'production';
  if (swaggerEnabled) {
    const meta = readAppMeta();
    const config = new DocumentBuilder()
      .setTitle('reaparr API')
      .setDescription(
        'Settings, connection test, run trigger and last-run report for the Radarr tag cleanup.',
      )
      .setVersion(meta.version)
      .build();

    const document = SwaggerModule.createDocument(app, config);
    // Swagger routes ignore the global prefix; the path carries it.
    SwaggerModule.setup(API_DOCS_PATH, app, document);
  }

  const port = Number.parseInt(process.env.PORT ?? `${API_DEFAULT_PORT}`, 10);
  const host = process.env.HOST ?? API_DEFAULT_HOST;
  try {
    await app.listen(port, host);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException | undefined)?.code;
    if (code === 'EADDRINUSE') {
      bootstrapLogger.error(
        `Port ${port} is already in use. Stop the other process or set PORT to a free port.`,
      );
      process.exit(1);
    }
    throw err;
  }

  const url = await app.getUrl().catch(() => `http://${host}:${port}`);
  bootstrapLogger.log(
    `API listening: ${url}${API_PREFIX_PATH} (dataDir=${dataDir})`,
  );
}

void bootstrap().catch((err) => {
  const logger = new Logger('Bootstrap');
  logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exit(1);
});
