import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const booleano = (porDefecto: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(porDefecto)
    .transform((v) => v === 'true');

// Vacío en el .env equivale a no definido
const opcional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === '' ? undefined : v), schema.optional());

const envSchema = z.object({
  // Fuentes
  COMPRAR_BASE_URL: z.string().url().default('https://comprar.gob.ar'),
  BOLETIN_BASE_URL: z.string().url().default('https://www.boletinoficial.gob.ar'),

  // HTTP
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  USER_AGENT: z
    .string()
    .min(1)
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36'
    ),
  DELAY_LISTADO_MS: z.coerce.number().int().nonnegative().default(1000),
  DELAY_DETALLE_MS: z.coerce.number().int().nonnegative().default(1000),
  MAX_PAGINAS: opcional(z.coerce.number().int().positive()),

  // Browser
  HEADLESS: booleano('true'),
  BROWSER_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  CHROME_EXECUTABLE_PATH: opcional(z.string()),

  // Proxy
  PROXY_HOST: opcional(z.string()),
  PROXY_PORT: opcional(z.coerce.number().int().positive()),
  PROXY_USER: opcional(z.string()),
  PROXY_PASS: opcional(z.string()),

  // Exportación
  EXPORT_FORMATS: z
    .string()
    .default('xlsx')
    .transform((v) => v.split(',').map((f) => f.trim().toLowerCase()).filter(Boolean))
    .pipe(z.array(z.enum(['xlsx', 'json'])).min(1)),

  // Logging
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  LOG_PRETTY: booleano('true'),

  // Debug
  DEBUG_MODE: booleano('false'),
  DEBUG_DIR: z.string().min(1).default('debug-output'),

  // Supabase
  SUPABASE_URL: opcional(z.string().url()),
  SUPABASE_SERVICE_KEY: opcional(z.string().min(1)),

  // Programación
  SCHEDULE_CRON: z.string().min(1).default('0 7 * * 1-5'),
  SCHEDULE_DAYS: z.coerce.number().int().positive().default(1),
  SCHEDULE_OUTPUT_DIR: z.string().min(1).default('salida'),
});

function loadEnv() {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error('❌ Variables de entorno inválidas:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;
