// src/ecp/cast-session-manager.ts
// Lifecycle of the one stream being cast to a device through the companion
// receiver app:
//
//   idle -> starting -> active -> stopped
//              \          \
//               `-> failed `-> failed
//
// The receiver's health is never polled directly. The coordinator's regular
// refresh reports the active app, and a session whose receiver is no longer in
// the foreground is marked stopped (e.g. someone pressed Home on the remote).
// The protocol has no push notifications, so detection lags by one poll.

import type { CommandDispatcher } from './command-dispatcher.js';
import { DEFAULT_RECEIVER_APP_ID } from './constants.js';
import type { DeviceCoordinator } from './device-coordinator.js';
import {
	InvalidContentReferenceError,
	SessionConflictError,
	describeError,
	isEcpError,
} from './errors.js';
import type { EcpLogger } from './logger.js';
import { consoleLogger } from './logger.js';
import type { CastSession, DeviceIdentity, DeviceState } from './types.js';

export interface CastSessionManagerOptions {
	receiverAppId?: string;
	logger?: EcpLogger;
}

export type CastSessionListener = (session: CastSession) => void;

export const DEFAULT_CAST_FORMAT = 'hls';

export class CastSessionManager {
	public readonly receiverAppId: string;

	private readonly dispatcher: CommandDispatcher;
	private readonly coordinator: DeviceCoordinator;
	private readonly target: DeviceIdentity;
	private readonly log: EcpLogger;
	private readonly listeners = new Set<CastSessionListener>();
	private readonly unsubscribe: () => void;

	private session: CastSession | null = null;
	private stopping: Promise<CastSession | null> | null = null;
	// Refresh cycles up to this one may predate the launch and are not trusted.
	private activatedAfterCycle = 0;
	private seq = 0;

	constructor(
		dispatcher: CommandDispatcher,
		coordinator: DeviceCoordinator,
		target: DeviceIdentity,
		options: CastSessionManagerOptions = {},
	) {
		this.dispatcher = dispatcher;
		this.coordinator = coordinator;
		this.target = target;
		this.receiverAppId = options.receiverAppId ?? DEFAULT_RECEIVER_APP_ID;
		this.log = options.logger ?? consoleLogger('ecp-cast');

		this.unsubscribe = coordinator.onRefresh((state, cycle) => {
			this.reconcile(state, cycle);
		});
	}

	public current(): CastSession | null {
		return this.session;
	}

	public onChange(listener: CastSessionListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Open `streamUrl` in the receiver app. Rejects with SessionConflictError,
	 * without touching the device, while another session is starting or active.
	 */
	public async start(streamUrl: string, format: string = DEFAULT_CAST_FORMAT): Promise<CastSession> {
		const existing = this.session;
		if (existing && (existing.status === 'starting' || existing.status === 'active')) {
			throw new SessionConflictError(existing.id, existing.status);
		}
		if (!isHttpUrl(streamUrl)) {
			throw new InvalidContentReferenceError(streamUrl, 'stream URL must be http(s)');
		}

		this.seq += 1;
		const starting = this.replace({
			id: `cast_${Date.now()}_${this.seq}`,
			streamUrl,
			format,
			target: this.target,
			status: 'starting',
			startedAt: new Date(),
			endedAt: null,
			error: null,
		});

		try {
			await this.dispatcher.openReceiverStream(this.receiverAppId, streamUrl, format);
		} catch (err) {
			// A pending stop() settles the session as stopped.
			if (this.isCurrent(starting, 'starting') && !this.stopping) {
				this.replace({
					...starting,
					status: 'failed',
					endedAt: new Date(),
					error: isEcpError(err) ? err : null,
				});
			}
			this.log.warn('Cast of %s to %s failed: %s', streamUrl, this.target.host, describeError(err));
			throw err;
		}

		if (!this.isCurrent(starting, 'starting')) {
			// stop() won the race while the launch was in flight.
			return this.session ?? starting;
		}

		this.activatedAfterCycle = this.coordinator.cycleCount;
		this.log.info('Cast session %s active on %s', starting.id, this.target.host);
		return this.replace({ ...starting, status: 'active' });
	}

	/**
	 * Best-effort stop. The session ends up stopped locally even if the stop
	 * command cannot be delivered. Calling it with nothing to stop is a no-op.
	 */
	public stop(): Promise<CastSession | null> {
		const session = this.session;
		if (!session || (session.status !== 'starting' && session.status !== 'active')) {
			return Promise.resolve(session);
		}
		if (this.stopping) {
			return this.stopping;
		}

		this.stopping = this.performStop(session).finally(() => {
			this.stopping = null;
		});
		return this.stopping;
	}

	public dispose(): void {
		this.unsubscribe();
		this.listeners.clear();
	}

	private async performStop(session: CastSession): Promise<CastSession | null> {
		try {
			await this.dispatcher.stopReceiverStream(this.receiverAppId);
		} catch (err) {
			this.log.warn(
				'Stop command for cast session %s failed (%s); marking it stopped anyway',
				session.id,
				describeError(err),
			);
		}

		const current = this.session;
		if (current && current.id === session.id && (current.status === 'starting' || current.status === 'active')) {
			this.log.info('Cast session %s stopped', session.id);
			return this.replace({ ...current, status: 'stopped', endedAt: new Date() });
		}
		return current;
	}

	private reconcile(state: DeviceState, cycle: number): void {
		const session = this.session;
		if (!session || session.status !== 'active' || cycle <= this.activatedAfterCycle) {
			return;
		}
		if (state.activeApp?.id === this.receiverAppId) {
			return;
		}

		this.log.info(
			'Cast session %s ended on the device (foreground app is now %s)',
			session.id,
			state.activeApp?.name ?? 'none',
		);
		this.replace({ ...session, status: 'stopped', endedAt: new Date() });
	}

	private isCurrent(session: CastSession, status: CastSession['status']): boolean {
		return this.session !== null && this.session.id === session.id && this.session.status === status;
	}

	private replace(next: CastSession): CastSession {
		const frozen = Object.freeze(next);
		this.session = frozen;
		for (const listener of this.listeners) {
			try {
				listener(frozen);
			} catch (err) {
				this.log.error('Cast session listener threw: %s', describeError(err));
			}
		}
		return frozen;
	}
}

function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol === 'http:' || url.protocol === 'https:';
	} catch {
		return false;
	}
}
