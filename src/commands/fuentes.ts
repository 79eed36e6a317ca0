import type { Command } from 'commander';
import { CLAVES_FUENTES } from '../adapters/registry.js';

export function registrarFuentes(program: Command): void {
  program
    .command('fuentes')
    .description('Lista las fuentes disponibles')
    .action(() => {
      for (const clave of CLAVES_FUENTES) process.stdout.write(`${clave}\n`);
    });
}
