import type { Command } from 'commander';
import { z } from 'zod';
import { ejecutarComprar } from '../adapters/comprar.js';
import { ProgressReporter } from '../adapters/pipeline.js';
import { buildScraperConfig } from '../config/scraper-config.js';
import { aModeloTics, subirABigQuery, verificarCredenciales } from '../services/bigquery.js';
import { logger } from '../utils/logger.js';
import { parsearOpciones } from './opciones.js';

const opcionesComprarBigQuery = z.object({
  projectId: z.string().min(1),
  dataset: z.string().min(1),
  table: z.string().min(1),
  credentials: z.string().min(1),
});

export function registrarComprarABigQuery(program: Command): void {
  program
    .command('comprar-a-bigquery')
    .description('Scrapea COMPR.AR con el navegador y carga el resultado en BigQuery')
    .requiredOption('--project-id <id>', 'proyecto de Google Cloud')
    .requiredOption('--dataset <id>', 'dataset de BigQuery')
    .requiredOption('--table <nombre>', 'tabla de BigQuery')
    .requiredOption('--credentials <ruta>', 'JSON de la service account')
    .action(async (crudas: unknown) => {
      const opciones = parsearOpciones(opcionesComprarBigQuery, crudas);
      // Antes de abrir el navegador
      verificarCredenciales(opciones.credentials);

      const progreso = new ProgressReporter((porcentaje) => logger.info('Progreso: %d%%', porcentaje));
      const { registros, estado } = await ejecutarComprar('navegador', buildScraperConfig(), progreso);
      logger.info('Procesos obtenidos: %d (%s)', registros.length, estado);

      if (registros.length === 0) {
        logger.warn('No se obtuvieron procesos, no se sube nada');
        return;
      }
      await subirABigQuery(registros.map(aModeloTics), opciones);
    });
}
