import { config } from 'dotenv';
import { z } from 'zod';

config({ override: false });

const envSchema = z.object({
	VECTORBRIDGE_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('info'),
	REDACT_SECRETS: z.boolean().default(true),
	// Vector Storage Configuration
	VECTOR_STORE_URL: z.string().optional(),
	VECTOR_STORE_API_KEY: z.string().optional(),
	VECTOR_STORE_USERNAME: z.string().optional(),
	VECTOR_STORE_PASSWORD: z.string().optional(),
	VECTOR_STORE_DATABASE: z.string().optional(),
	VECTOR_STORE_SSL: z.boolean().default(false),
	VECTOR_STORE_TIMEOUT: z.number().optional(),
	VECTOR_STORE_COLLECTION: z.string().default('default'),
	VECTOR_STORE_PRIMARY_KEY: z.string().optional(),
	VECTOR_STORE_CHUNK_FIELD: z.string().optional(),
	VECTOR_STORE_TOP_K: z.number().optional(),
});

type EnvSchema = z.infer<typeof envSchema>;

const parseNumber = (raw: string | undefined): number | undefined => {
	if (raw === undefined || raw.trim() === '') return undefined;
	const parsed = Number(raw);
	return Number.isFinite(parsed) ? parsed : undefined;
};

const logLevels = envSchema.shape.VECTORBRIDGE_LOG_LEVEL.removeDefault();

// Always reads from process.env so tests and late `.env` loading see current values
export const env: EnvSchema = new Proxy({} as EnvSchema, {
	get(_target, prop: string): unknown {
		switch (prop) {
			case 'VECTORBRIDGE_LOG_LEVEL': {
				const level = logLevels.safeParse(process.env.VECTORBRIDGE_LOG_LEVEL?.toLowerCase());
				return level.success ? level.data : 'info';
			}
			case 'REDACT_SECRETS':
				return process.env.REDACT_SECRETS === 'false' ? false : true;
			case 'VECTOR_STORE_SSL':
				return process.env.VECTOR_STORE_SSL === 'true';
			case 'VECTOR_STORE_TIMEOUT':
			case 'VECTOR_STORE_TOP_K':
				return parseNumber(process.env[prop]);
			case 'VECTOR_STORE_COLLECTION':
				return process.env.VECTOR_STORE_COLLECTION || 'default';
			default:
				return process.env[prop];
		}
	},
});
