import type { ChannelManager } from "./channels";
import { errorMessage } from "./errors";
import type { CalendarStore } from "./store";

const DEFAULT_INTERVAL_MS = 60 * 60 * 1000; // 1 hour
const DEFAULT_HORIZON_MS = 24 * 60 * 60 * 1000; // 24 hours

export interface RenewalSchedulerConfig {
	intervalMs?: number;
	/** Channels expiring within this many milliseconds are renewed. */
	horizonMs?: number;
}

export interface RenewalReport {
	found: number;
	renewed: number;
	// released by their last subscription while the scan ran
	skipped: number;
	failed: number;
	stoppedEarly: boolean;
}

/**
 * Periodically renews watch channels that are about to expire. Shutdown is
 * cooperative: it is observed before a scan and between channels, never
 * while a channel is being renewed.
 */
export class RenewalScheduler {
	private readonly intervalMs: number;
	private readonly horizonMs: number;
	private timer: NodeJS.Timeout | null = null;
	private currentScan: Promise<RenewalReport> | null = null;
	private shuttingDown = false;

	constructor(
		private readonly store: CalendarStore,
		private readonly channels: Pick<ChannelManager, "renew">,
		config: RenewalSchedulerConfig = {}
	) {
		this.intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
		this.horizonMs = config.horizonMs ?? DEFAULT_HORIZON_MS;
	}

	start() {
		if (this.timer || this.shuttingDown) return;

		console.log(
			`[RenewalScheduler] Starting with interval ${this.intervalMs}ms, horizon ${this.horizonMs}ms`
		);
		this.timer = setInterval(async () => {
			try {
				await this.runOnce();
			} catch (err) {
				console.error("[RenewalScheduler] Error getting expiring channels:", err);
			}
		}, this.intervalMs);
	}

	/** Idempotent; resolves once an in-flight scan has wound down. */
	async stop() {
		this.shuttingDown = true;
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
		if (this.currentScan) {
			try {
				await this.currentScan;
			} catch (err) {
				console.error("[RenewalScheduler] Scan failed during shutdown:", err);
			}
		}
		console.log("[RenewalScheduler] Stopped");
	}

	/**
	 * Runs one scan unless one is already in flight, in which case the
	 * in-flight scan is returned.
	 */
	runOnce(): Promise<RenewalReport> {
		if (this.currentScan) return this.currentScan;

		const scan = this.scan().finally(() => {
			this.currentScan = null;
		});
		this.currentScan = scan;
		return scan;
	}

	private async scan(): Promise<RenewalReport> {
		const report: RenewalReport = {
			found: 0,
			renewed: 0,
			skipped: 0,
			failed: 0,
			stoppedEarly: false,
		};
		if (this.shuttingDown) {
			report.stoppedEarly = true;
			return report;
		}

		const expiring = await this.store.listChannelsExpiringBefore(
			new Date(Date.now() + this.horizonMs)
		);
		report.found = expiring.length;
		console.log(`[RenewalScheduler] Found ${expiring.length} channels to renew`);

		for (const channel of expiring) {
			if (this.shuttingDown) {
				report.stoppedEarly = true;
				break;
			}
			try {
				const renewed = await this.channels.renew(channel);
				if (renewed) report.renewed++;
				else report.skipped++;
			} catch (err) {
				report.failed++;
				console.error(
					`[RenewalScheduler] Failed to renew channel ${channel.channelId} (account ${channel.accountId}, calendar ${channel.calendarId}): ${errorMessage(err)}`
				);
			}
		}

		return report;
	}
}
