import { writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { logger } from './logger.js';

export interface OpcionesDebug {
  debug: boolean;
  debugDir: string;
}

function nombreSeguro(nombre: string): string {
  return nombre.replace(/[^a-zA-Z0-9._-]+/g, '_');
}

/**
 * Guarda el HTML recibido para analizar cambios de estructura del sitio.
 * No hace nada fuera de DEBUG_MODE.
 */
export function guardarHtml(opciones: OpcionesDebug, nombre: string, html: string): string | null {
  if (!opciones.debug) return null;

  mkdirSync(opciones.debugDir, { recursive: true });
  const filepath = join(opciones.debugDir, `${nombreSeguro(nombre)}.html`);
  writeFileSync(filepath, html, 'utf-8');
  logger.debug('HTML guardado en: %s', filepath);
  return filepath;
}
