import { readFileSync } from 'fs';
import { z } from 'zod';
import { env } from './env.js';
import type { FormatoExport } from '../types/index.js';

const PALABRAS_TIC_PATH = new URL('../../data/palabras-tic.json', import.meta.url);

/**
 * Configuración explícita de una corrida. Se arma una vez por ejecución
 * y viaja por parámetro a adapters, estrategias y sinks.
 */
export interface ScraperConfig {
  comprarBaseUrl: string;
  boletinBaseUrl: string;
  userAgent: string;
  timeoutMs: number;
  delayListadoMs: number;
  delayDetalleMs: number;
  maxPaginas: number | null;
  palabrasTic: string[];
  headless: boolean;
  browserTimeoutMs: number;
  chromeExecutablePath: string | null;
  formatos: FormatoExport[];
  debug: boolean;
  debugDir: string;
}

let palabrasCache: string[] | null = null;

export function cargarPalabrasTic(): string[] {
  if (!palabrasCache) {
    const raw: unknown = JSON.parse(readFileSync(PALABRAS_TIC_PATH, 'utf-8'));
    palabrasCache = z.array(z.string().min(1)).parse(raw);
  }
  return palabrasCache;
}

export function buildScraperConfig(overrides: Partial<ScraperConfig> = {}): ScraperConfig {
  return {
    comprarBaseUrl: env.COMPRAR_BASE_URL,
    boletinBaseUrl: env.BOLETIN_BASE_URL,
    userAgent: env.USER_AGENT,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    delayListadoMs: env.DELAY_LISTADO_MS,
    delayDetalleMs: env.DELAY_DETALLE_MS,
    maxPaginas: env.MAX_PAGINAS ?? null,
    palabrasTic: overrides.palabrasTic ?? cargarPalabrasTic(),
    headless: env.HEADLESS,
    browserTimeoutMs: env.BROWSER_TIMEOUT_MS,
    chromeExecutablePath: env.CHROME_EXECUTABLE_PATH ?? null,
    formatos: env.EXPORT_FORMATS,
    debug: env.DEBUG_MODE,
    debugDir: env.DEBUG_DIR,
    ...overrides,
  };
}
