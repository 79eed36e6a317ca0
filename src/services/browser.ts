import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import puppeteerCore from 'puppeteer-core';
import type { Browser, Page } from 'puppeteer-core';
import type { ScraperConfig } from '../config/scraper-config.js';
import { env } from '../config/env.js';
import { logger } from '../utils/logger.js';

const puppeteer = addExtra(puppeteerCore);
puppeteer.use(StealthPlugin());

/**
 * Lanza un Chrome nuevo para la corrida. Quien lo lanza lo cierra.
 */
export async function launchBrowser(config: ScraperConfig): Promise<Browser> {
  logger.info('Iniciando browser...');

  const browserArgs = [
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    '--disable-extensions',
    '--disable-sync',
    '--disable-translate',
    '--no-first-run',
    '--window-size=1400,900',
    '--lang=es-AR',
  ];

  if (env.PROXY_HOST && env.PROXY_PORT) {
    browserArgs.push(`--proxy-server=${env.PROXY_HOST}:${env.PROXY_PORT}`);
    logger.info('Usando proxy: %s:%d', env.PROXY_HOST, env.PROXY_PORT);
  }

  // Sin ruta explícita se usa el Chrome estable instalado en el sistema
  const destino = config.chromeExecutablePath
    ? { executablePath: config.chromeExecutablePath }
    : { channel: 'chrome' as const };

  const browser: Browser = await puppeteer.launch({
    ...destino,
    headless: config.headless,
    args: browserArgs,
    defaultViewport: { width: 1400, height: 900 },
    timeout: config.browserTimeoutMs,
  });

  logger.info('Browser iniciado con éxito');
  return browser;
}

export async function newPage(browser: Browser, config: ScraperConfig): Promise<Page> {
  const page = await browser.newPage();

  if (env.PROXY_USER && env.PROXY_PASS) {
    await page.authenticate({
      username: env.PROXY_USER,
      password: env.PROXY_PASS,
    });
    logger.debug('Proxy autenticado');
  }

  await page.setUserAgent(config.userAgent);
  await page.setExtraHTTPHeaders({
    'Accept-Language': 'es-AR,es;q=0.9,en;q=0.8',
  });

  page.setDefaultTimeout(config.browserTimeoutMs);
  page.setDefaultNavigationTimeout(config.browserTimeoutMs);

  return page;
}

export async function closeBrowser(browser: Browser): Promise<void> {
  logger.info('Cerrando browser...');
  await browser.close();
  logger.info('Browser cerrado');
}
