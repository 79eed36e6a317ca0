import type { Command } from 'commander';
import { z } from 'zod';
import { env } from '../config/env.js';
import { Programador } from '../services/scheduler.js';
import { logger } from '../utils/logger.js';
import { enteroPositivo, parsearOpciones } from './opciones.js';

// Tope para esperar un ciclo en curso al apagar
const ESPERA_MAXIMA_MS = 2 * 60 * 1000;

const opcionesProgramar = z.object({
  cron: z.string().min(1).default(env.SCHEDULE_CRON),
  dias: enteroPositivo.default(env.SCHEDULE_DAYS),
  salida: z.string().min(1).default(env.SCHEDULE_OUTPUT_DIR),
});

/**
 * Cierre ordenado: corta el cron y espera el ciclo en curso.
 */
function gracefulShutdown(programador: Programador, signal: string): void {
  logger.info('Recibida señal %s, cerrando...', signal);
  programador.detener();

  if (!programador.ocupado) {
    process.exit(0);
  }

  logger.info('Esperando que termine el ciclo en ejecución...');
  const checkInterval = setInterval(() => {
    if (!programador.ocupado) {
      clearInterval(checkInterval);
      logger.info('Ciclo finalizado. Cerrando proceso.');
      process.exit(0);
    }
  }, 1000);

  setTimeout(() => {
    logger.warn('Timeout esperando el ciclo. Forzando cierre.');
    process.exit(1);
  }, ESPERA_MAXIMA_MS);
}

export function registrarProgramar(program: Command): void {
  program
    .command('programar')
    .description('Corre una fuente de forma desatendida según una expresión cron')
    .argument('<fuente>', 'clave de la fuente')
    .option('--cron <expr>', 'expresión cron (default: SCHEDULE_CRON)')
    .option('--dias <n>', 'días cubiertos por cada corrida, terminando hoy')
    .option('--salida <dir>', 'carpeta de salida')
    .action((fuente: string, crudas: unknown) => {
      const opciones = parsearOpciones(opcionesProgramar, crudas);
      const programador = new Programador({
        fuente,
        cron: opciones.cron,
        dias: opciones.dias,
        carpetaSalida: opciones.salida,
      });

      process.on('SIGINT', () => gracefulShutdown(programador, 'SIGINT'));
      process.on('SIGTERM', () => gracefulShutdown(programador, 'SIGTERM'));

      programador.iniciar();
      logger.info('Programador corriendo. Ctrl+C para detener.');
    });
}
