import jwt from "jsonwebtoken";
import type { FastifyRequest } from "fastify";
import { z } from "zod";

export interface AuthenticatedAccount {
	id: string;
	email: string;
	name: string;
}

const tokenPayloadSchema = z.object({
	accountId: z.string().min(1),
	email: z.string(),
	name: z.string(),
});

export function getAccountFromRequest(
	request: FastifyRequest,
	secret: string
): AuthenticatedAccount | null {
	const token = request.headers.authorization?.replace("Bearer ", "");
	if (!token) return null;

	try {
		const decoded = tokenPayloadSchema.safeParse(jwt.verify(token, secret));
		if (!decoded.success) return null;

		return {
			id: decoded.data.accountId,
			email: decoded.data.email,
			name: decoded.data.name,
		};
	} catch (error) {
		console.error("Auth error:", error);
		return null;
	}
}

export function createAccountToken(
	account: AuthenticatedAccount,
	secret: string
): string {
	return jwt.sign(
		{
			accountId: account.id,
			email: account.email,
			name: account.name,
		},
		secret,
		{ expiresIn: "7d" }
	);
}
