import type { Command } from 'commander';
import { subDays } from 'date-fns';
import { z } from 'zod';
import { buildScraperConfig } from '../config/scraper-config.js';
import { env } from '../config/env.js';
import { RunController } from '../services/run-controller.js';
import type { ResultadoCorrida } from '../services/run-controller.js';
import type { FormatoExport } from '../types/index.js';
import { fechaIso } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { enteroPositivo, fechaCli, parsearOpciones } from './opciones.js';

const opcionesScrape = z.object({
  desde: fechaCli.optional(),
  hasta: fechaCli.optional(),
  salida: z.string().min(1).default('salida'),
  maxPaginas: enteroPositivo.optional(),
  json: z.boolean().default(false),
});

/**
 * Corre una fuente mostrando avance y tiempo restante. Ctrl+C cancela y
 * exporta lo recolectado hasta ese momento.
 */
export async function ejecutarScrape(fuente: string, opcionesCrudas: unknown): Promise<ResultadoCorrida> {
  const opciones = parsearOpciones(opcionesScrape, opcionesCrudas);
  const hoy = new Date();
  const desde = opciones.desde ?? subDays(hoy, 7);
  const hasta = opciones.hasta ?? hoy;

  const formatos: FormatoExport[] = [...env.EXPORT_FORMATS];
  if (opciones.json && !formatos.includes('json')) formatos.push('json');

  const config = buildScraperConfig({
    formatos,
    ...(opciones.maxPaginas ? { maxPaginas: opciones.maxPaginas } : {}),
  });

  const controller = new RunController();
  controller
    .on('progress', (porcentaje, eta) => {
      logger.info('Progreso: %d%% (restante: %s)', porcentaje, eta ?? '--');
    })
    .on('finished', (cantidad, cancelado) => {
      if (cancelado) logger.warn('Corrida cancelada: %d registros exportados', cantidad);
      else logger.info('Corrida completada: %d registros exportados', cantidad);
    })
    .on('fallo', (mensaje) => {
      logger.error('La corrida terminó con error: %s', mensaje);
    });

  const alInterrumpir = () => controller.cancelar();
  process.on('SIGINT', alInterrumpir);

  logger.info('Fuente %s, %s → %s, salida en %s', fuente, fechaIso(desde), fechaIso(hasta), opciones.salida);
  try {
    return await controller.ejecutar({ fuente, desde, hasta, carpetaSalida: opciones.salida, config });
  } finally {
    process.off('SIGINT', alInterrumpir);
  }
}

export function registrarScrape(program: Command): void {
  program
    .command('scrape')
    .description('Scrapea una fuente y exporta los procesos encontrados')
    .argument('<fuente>', 'clave de la fuente (ver "fuentes")')
    .option('--desde <fecha>', 'fecha inicial dd/MM/yyyy (default: hace 7 días)')
    .option('--hasta <fecha>', 'fecha final dd/MM/yyyy (default: hoy)')
    .option('--salida <dir>', 'carpeta de salida', 'salida')
    .option('--max-paginas <n>', 'límite de páginas del listado')
    .option('--json', 'exportar también a JSON', false)
    .action(async (fuente: string, opciones: unknown) => {
      const resultado = await ejecutarScrape(fuente, opciones);
      if (resultado.estado === 'error') process.exitCode = 1;
    });
}
