#!/usr/bin/env node
import { Command } from 'commander';
import { registrarComprarABigQuery } from './commands/comprar-a-bigquery.js';
import { registrarConvertir } from './commands/convertir.js';
import { registrarFuentes } from './commands/fuentes.js';
import { registrarProgramar } from './commands/programar.js';
import { registrarScrape } from './commands/scrape.js';
import { registrarSubidas } from './commands/subir.js';
import { logger } from './utils/logger.js';

async function main() {
  const program = new Command()
    .name('compras')
    .description('Scraper de procesos de compras públicas (Boletín Oficial y COMPR.AR)')
    .version('1.0.0');

  registrarScrape(program);
  registrarFuentes(program);
  registrarConvertir(program);
  registrarSubidas(program);
  registrarComprarABigQuery(program);
  registrarProgramar(program);

  await program.parseAsync(process.argv);
}

main().catch((err) => {
  logger.fatal({ err }, 'Error fatal');
  process.exit(1);
});
