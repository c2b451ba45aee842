import type { FastifyRequest } from "fastify";

export function header(request: FastifyRequest, name: string): string | null {
	const value = request.headers[name];
	if (Array.isArray(value)) return value[0] ?? null;
	return value ?? null;
}
