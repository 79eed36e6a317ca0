import type { Command } from 'commander';
import { z } from 'zod';
import { convertirExcelAJson, rutaJsonPorDefecto } from '../services/convertir-excel.js';
import { logger } from '../utils/logger.js';
import { enteroPositivo, parsearOpciones } from './opciones.js';

const opcionesConvertir = z.object({
  sheet: z.string().min(1).optional(),
  headerRow: enteroPositivo.default(1),
  output: z.string().min(1).optional(),
  modeloTics: z.boolean().default(false),
});

export function registrarConvertir(program: Command): void {
  program
    .command('convertir')
    .description('Convierte una hoja de Excel a JSON (lista de registros)')
    .argument('<excel>', 'planilla de entrada')
    .option('--sheet <nombre>', 'hoja a leer (default: la primera)')
    .option('--header-row <n>', 'fila de encabezados, empezando en 1', '1')
    .option('-o, --output <json>', 'archivo de salida (default: mismo nombre con .json)')
    .option('--modelo-tics', 'renombrar columnas al modelo procesos_tics', false)
    .action((excel: string, crudas: unknown) => {
      const opciones = parsearOpciones(opcionesConvertir, crudas);
      const { ruta, filas } = convertirExcelAJson(excel, opciones.output ?? rutaJsonPorDefecto(excel), {
        hoja: opciones.sheet,
        filaEncabezado: opciones.headerRow,
        modeloTics: opciones.modeloTics,
      });
      logger.info('JSON generado en %s (%d filas)', ruta, filas);
    });
}
