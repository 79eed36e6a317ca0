import { z } from 'zod';
import { parseFechaCli } from '../utils/dates.js';

export const fechaCli = z.string().transform((valor, ctx) => {
  const fecha = parseFechaCli(valor);
  if (!fecha) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Fecha inválida: ${valor} (usar dd/MM/yyyy)` });
    return z.NEVER;
  }
  return fecha;
});

export const enteroPositivo = z.coerce.number().int().positive();

/**
 * Valida las opciones que entrega commander; un error corta el comando.
 */
export function parsearOpciones<T extends z.ZodTypeAny>(schema: T, opciones: unknown): z.infer<T> {
  const resultado = schema.safeParse(opciones);
  if (!resultado.success) {
    const detalle = resultado.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new Error(`Opciones inválidas: ${detalle}`);
  }
  return resultado.data;
}
