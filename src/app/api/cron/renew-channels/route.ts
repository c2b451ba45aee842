import type { FastifyReply, FastifyRequest } from "fastify";
import { errorMessage } from "@/lib/errors";
import type { RenewalScheduler } from "@/lib/renewal";

// Lets an external cron trigger a renewal pass between scheduled scans.
export function createRenewChannelsRoute(
	scheduler: RenewalScheduler,
	cronSecret: string
) {
	async function GET(request: FastifyRequest, reply: FastifyReply) {
		if (request.headers.authorization !== `Bearer ${cronSecret}`) {
			return reply.code(401).send({ success: false, error: "Unauthorized" });
		}

		try {
			console.log("🔄 Starting channel renewal check...");
			const report = await scheduler.runOnce();

			return reply.send({
				success: true,
				message: `Processed ${report.found} channels`,
				renewed: report.renewed,
				failed: report.failed,
			});
		} catch (error) {
			console.error("Channel renewal error:", error);
			return reply.code(500).send({
				success: false,
				error: errorMessage(error),
			});
		}
	}

	return { GET };
}
