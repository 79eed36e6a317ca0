import { EventEmitter } from 'events';
import { obtenerAdapter } from '../adapters/registry.js';
import type { AdapterFuente, OpcionesAdapter } from '../adapters/pipeline.js';
import { CancellationToken } from '../adapters/pipeline.js';
import type { ScraperConfig } from '../config/scraper-config.js';
import { logger } from '../utils/logger.js';

export interface SolicitudCorrida {
  fuente: string;
  desde: Date;
  hasta: Date;
  carpetaSalida: string;
  config?: ScraperConfig;
}

export type ResultadoCorrida =
  | { estado: 'completado'; cantidad: number }
  | { estado: 'cancelado'; cantidad: number }
  | { estado: 'error'; mensaje: string };

interface EventosCorrida {
  progress: [porcentaje: number, eta: string | null];
  finished: [cantidad: number, cancelado: boolean];
  fallo: [mensaje: string];
}

/**
 * "1h 02m 03s" o "2m 05s".
 */
export function formatearDuracion(segundos: number): string {
  const total = Math.max(0, Math.round(segundos));
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const mm = String(m).padStart(2, '0');
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}h ${mm}m ${ss}s` : `${m}m ${ss}s`;
}

/**
 * Tiempo restante estimado a partir de lo transcurrido. Sin avance no hay estimación.
 */
export function estimarRestante(transcurridoMs: number, porcentaje: number): string | null {
  if (porcentaje <= 0 || porcentaje >= 100) return null;
  const transcurrido = transcurridoMs / 1000;
  return formatearDuracion((transcurrido * 100) / porcentaje - transcurrido);
}

export function validarSolicitud(
  solicitud: SolicitudCorrida,
  resolverAdapter: (clave: string) => AdapterFuente = obtenerAdapter
): AdapterFuente {
  const adapter = resolverAdapter(solicitud.fuente);
  if (solicitud.desde.getTime() > solicitud.hasta.getTime()) {
    throw new Error('La fecha "desde" no puede ser posterior a "hasta"');
  }
  if (!solicitud.carpetaSalida.trim()) {
    throw new Error('Falta la carpeta de salida');
  }
  return adapter;
}

/**
 * Corre un adapter como tarea de fondo y publica su avance como eventos.
 * Una corrida a la vez; cada una tiene su propio token de cancelación.
 */
export class RunController {
  private readonly emitter = new EventEmitter();
  private token = new CancellationToken();
  private inicio = 0;
  private corriendo = false;

  constructor(private readonly resolverAdapter: (clave: string) => AdapterFuente = obtenerAdapter) {}

  on<E extends keyof EventosCorrida>(evento: E, listener: (...args: EventosCorrida[E]) => void): this {
    this.emitter.on(evento, listener);
    return this;
  }

  private emit<E extends keyof EventosCorrida>(evento: E, ...args: EventosCorrida[E]): void {
    this.emitter.emit(evento, ...args);
  }

  get enCurso(): boolean {
    return this.corriendo;
  }

  cancelar(): void {
    if (!this.corriendo) return;
    logger.warn('Cancelación solicitada, se detiene en la próxima unidad de trabajo');
    this.token.cancel();
  }

  async ejecutar(solicitud: SolicitudCorrida): Promise<ResultadoCorrida> {
    if (this.corriendo) throw new Error('Ya hay una corrida en curso');

    let adapter: AdapterFuente;
    try {
      adapter = validarSolicitud(solicitud, this.resolverAdapter);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.emit('fallo', err.message);
      return { estado: 'error', mensaje: err.message };
    }

    this.corriendo = true;
    this.token = new CancellationToken();
    this.inicio = Date.now();

    const token = this.token;
    const opciones: OpcionesAdapter = {
      onProgress: (porcentaje) => this.emit('progress', porcentaje, estimarRestante(Date.now() - this.inicio, porcentaje)),
      isCancelled: token.isCancelled,
      config: solicitud.config,
    };

    try {
      const cantidad = await adapter(solicitud.desde, solicitud.hasta, solicitud.carpetaSalida, opciones);
      const cancelado = token.isCancelled();
      this.emit('finished', cantidad, cancelado);
      return cancelado ? { estado: 'cancelado', cantidad } : { estado: 'completado', cantidad };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err, fuente: solicitud.fuente }, 'Error en la corrida');
      this.emit('fallo', err.message);
      return { estado: 'error', mensaje: err.message };
    } finally {
      this.corriendo = false;
    }
  }
}
