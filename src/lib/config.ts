import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors";

const configSchema = z.object({
	MONGODB_URI: z.string().min(1),
	GOOGLE_CLIENT_ID: z.string().min(1),
	GOOGLE_CLIENT_SECRET: z.string().min(1),
	GOOGLE_REDIRECT_URI: z.string().url(),
	WEBHOOK_ADDRESS: z.string().url(),
	JWT_SECRET: z.string().min(1),
	CRON_SECRET: z.string().min(1).optional(),
	PORT: z.coerce.number().int().positive().default(3000),
	HOST: z.string().default("0.0.0.0"),
	RENEW_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
	RENEW_HORIZON_MS: z.coerce
		.number()
		.int()
		.positive()
		.default(24 * 60 * 60 * 1000),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = configSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`
			)
		);
	}
	return result.data;
}
