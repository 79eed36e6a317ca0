import { join } from 'path';
import { buildScraperConfig } from '../config/scraper-config.js';
import type { ScraperConfig } from '../config/scraper-config.js';
import type { Columna } from '../services/export-xlsx.js';
import { COLUMNAS_BASE, escribirXlsx } from '../services/export-xlsx.js';
import { escribirJson } from '../services/export-json.js';
import type { CancelPredicate, FormatoExport, ProcesoCompra, ProgressCallback, ResultadoScraping } from '../types/index.js';
import { fechaCompacta } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

export interface OpcionesAdapter {
  onProgress?: ProgressCallback;
  isCancelled?: CancelPredicate;
  config?: ScraperConfig;
}

/**
 * Firma común de todas las fuentes: rango, carpeta y callbacks → cantidad exportada.
 */
export type AdapterFuente = (
  desde: Date,
  hasta: Date,
  carpetaSalida: string,
  opciones?: OpcionesAdapter
) => Promise<number>;

/**
 * Token de cancelación cooperativa: la corrida lo consulta antes de cada unidad de trabajo.
 */
export class CancellationToken {
  private cancelado = false;

  cancel(): void {
    this.cancelado = true;
  }

  readonly isCancelled = (): boolean => this.cancelado;
}

/**
 * Porcentaje entero en [0,100] que nunca retrocede ni se repite.
 */
export class ProgressReporter {
  private ultimo = -1;

  constructor(private readonly onProgress?: ProgressCallback) {}

  /**
   * `tope` limita el valor cuando el total es provisorio; el 100 queda para completar().
   */
  reportar(hechos: number, total: number, tope = 100): void {
    if (total <= 0) return;
    const porcentaje = Math.min(tope, 100, Math.max(0, Math.floor((hechos * 100) / total)));
    if (porcentaje <= this.ultimo) return;
    this.ultimo = porcentaje;
    this.onProgress?.(porcentaje);
  }

  completar(): void {
    this.reportar(1, 1);
  }

  get valor(): number {
    return Math.max(this.ultimo, 0);
  }
}

/**
 * Config de la corrida: la recibida, o una nueva desde el entorno.
 */
export function resolverConfig(opciones?: OpcionesAdapter): ScraperConfig {
  return opciones?.config ?? buildScraperConfig();
}

export function nombreArchivo(prefijo: string, desde: Date, hasta: Date, extension: FormatoExport): string {
  return `${prefijo}_${fechaCompacta(desde)}_${fechaCompacta(hasta)}.${extension}`;
}

export interface DestinoExportacion {
  carpeta: string;
  prefijo: string;
  desde: Date;
  hasta: Date;
  formatos: readonly FormatoExport[];
  columnas?: readonly Columna[];
}

/**
 * Escribe los registros en cada formato configurado. Sin registros no hay archivo.
 */
export function exportarRegistros(registros: readonly ProcesoCompra[], destino: DestinoExportacion): string[] {
  if (registros.length === 0) {
    logger.warn('Sin registros, no se exporta nada');
    return [];
  }

  return destino.formatos.map((formato) => {
    const ruta = join(destino.carpeta, nombreArchivo(destino.prefijo, destino.desde, destino.hasta, formato));
    return formato === 'xlsx'
      ? escribirXlsx(registros, ruta, destino.columnas ?? COLUMNAS_BASE)
      : escribirJson(registros, ruta);
  });
}

/**
 * Cierre común de un adapter: exporta lo recolectado (también si se canceló)
 * y emite el 100% solo si la corrida terminó.
 */
export function finalizarCorrida(
  resultado: ResultadoScraping,
  progreso: ProgressReporter,
  destino: DestinoExportacion
): number {
  exportarRegistros(resultado.registros, destino);
  if (resultado.estado === 'completado') {
    progreso.completar();
  } else {
    logger.warn('Corrida cancelada: %d registros parciales', resultado.registros.length);
  }
  return resultado.registros.length;
}
