import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { subDays } from 'date-fns';
import { obtenerAdapter } from '../adapters/registry.js';
import type { AdapterFuente } from '../adapters/pipeline.js';
import type { ScraperConfig } from '../config/scraper-config.js';
import { fechaIso } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

export const ZONA_HORARIA = 'America/Argentina/Buenos_Aires';

export interface OpcionesProgramador {
  fuente: string;
  cron: string;
  // Días cubiertos por cada corrida, terminando hoy
  dias: number;
  carpetaSalida: string;
  config?: ScraperConfig;
}

export function rangoProgramado(hoy: Date, dias: number): { desde: Date; hasta: Date } {
  return { desde: subDays(hoy, Math.max(dias, 1) - 1), hasta: hoy };
}

/**
 * Corridas desatendidas con node-cron. Nunca se superponen dos ciclos.
 */
export class Programador {
  private isRunning = false;
  private scheduledTask: ScheduledTask | null = null;
  private readonly adapter: AdapterFuente;

  constructor(
    private readonly opciones: OpcionesProgramador,
    resolverAdapter: (clave: string) => AdapterFuente = obtenerAdapter
  ) {
    if (!cron.validate(opciones.cron)) {
      throw new Error(`Expresión cron inválida: ${opciones.cron}`);
    }
    this.adapter = resolverAdapter(opciones.fuente);
  }

  get ocupado(): boolean {
    return this.isRunning;
  }

  /**
   * Un ciclo completo. Devuelve null si había otro en curso.
   */
  async ejecutarCiclo(hoy: Date = new Date()): Promise<number | null> {
    if (this.isRunning) {
      logger.warn('Ciclo anterior todavía en ejecución, se saltea...');
      return null;
    }

    this.isRunning = true;
    const { desde, hasta } = rangoProgramado(hoy, this.opciones.dias);

    try {
      logger.info('=== Ciclo %s: %s → %s ===', this.opciones.fuente, fechaIso(desde), fechaIso(hasta));
      const cantidad = await this.adapter(desde, hasta, this.opciones.carpetaSalida, {
        config: this.opciones.config,
      });
      logger.info('=== Ciclo terminado: %d registros ===', cantidad);
      return cantidad;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err }, 'Error en el ciclo programado');
      return 0;
    } finally {
      this.isRunning = false;
    }
  }

  iniciar(): void {
    this.detener();
    logger.info('Agendando corridas con expresión cron: %s (%s)', this.opciones.cron, ZONA_HORARIA);
    this.scheduledTask = cron.schedule(
      this.opciones.cron,
      async () => {
        logger.info('--- Ciclo agendado iniciado ---');
        await this.ejecutarCiclo();
      },
      { timezone: ZONA_HORARIA }
    );
  }

  detener(): void {
    if (this.scheduledTask) {
      this.scheduledTask.stop();
      this.scheduledTask = null;
      logger.info('Agendamiento cron detenido');
    }
  }
}
