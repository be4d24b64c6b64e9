import path from "node:path";
import {
	errorMessage,
	FileUnavailableError,
	NameConflictError,
	RegistryUnavailableError,
} from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { isDirectChild, normalizePath } from "./paths.js";
import { DEFAULT_LEASE_SECONDS, type Registry } from "./registry.js";
import {
	directoryExists,
	isShareableFile,
	listRegularFiles,
	listShareableFiles,
	loadIgnoreMatcher,
} from "./scan.js";
import type {
	ListingId,
	RegistrationTable,
	ShareChangeListener,
	SharedFileLookup,
} from "./types.js";

export const MAX_RESYNC_RETRIES = 3;
export const MIN_HEARTBEAT_SECONDS = 10;
/** Longest period a Node timer can hold. */
export const MAX_HEARTBEAT_SECONDS = 2147483;

export function heartbeatPeriodSeconds(leaseSeconds: number): number {
	const period = Math.max(
		MIN_HEARTBEAT_SECONDS,
		Math.floor(leaseSeconds * 0.75),
	);
	return Math.min(MAX_HEARTBEAT_SECONDS, period);
}

export interface ShareEngineOptions {
	registry: Registry;
	ownerId: string;
	ownerAddress: string;
	ownerPort: number;
	watchedDir?: string | null;
	ignorePatterns?: readonly string[];
	maxRetries?: number;
	logger?: Logger;
}

interface RegisteredFile {
	id: ListingId;
	filePath: string;
}

/**
 * Keeps the registry's listings for this peer in line with what the user
 * wants shared: the watched directory, files added by hand, minus exclusions.
 *
 * One reconcile pass runs at a time. A pass started while another is in
 * flight returns at once; `setWatchedDirectory` raises the pending-change
 * flag so the running pass goes around again with the new directory.
 */
export class ShareEngine implements SharedFileLookup {
	private readonly registry: Registry;
	private readonly ownerId: string;
	private readonly ownerAddress: string;
	private readonly ownerPort: number;
	private readonly ignorePatterns: readonly string[];
	private readonly maxRetries: number;
	private readonly logger: Logger;

	private watchedDir: string | null;
	private readonly listed = new Map<ListingId, string>();
	private readonly userShared = new Set<string>();
	private readonly excluded = new Set<string>();
	private readonly departing = new Set<string>();
	private readonly withdrawn = new Set<string>();
	private relisting: string[] = [];
	private readonly listeners = new Set<ShareChangeListener>();

	private changePending = false;
	private running: Promise<void> | null = null;
	private scheduled: Promise<void> | null = null;
	private timer: NodeJS.Timeout | null = null;

	constructor(options: ShareEngineOptions) {
		this.registry = options.registry;
		this.ownerId = options.ownerId;
		this.ownerAddress = options.ownerAddress;
		this.ownerPort = options.ownerPort;
		this.ignorePatterns = options.ignorePatterns ?? [];
		this.maxRetries = options.maxRetries ?? MAX_RESYNC_RETRIES;
		this.logger = (options.logger ?? silentLogger).child("share");
		this.watchedDir = options.watchedDir
			? normalizePath(options.watchedDir)
			: null;
	}

	getWatchedDirectory(): string | null {
		return this.watchedDir;
	}

	getRegistrations(): RegistrationTable {
		return new Map(this.listed);
	}

	getSharedFiles(): string[] {
		return [...this.listed.values()];
	}

	getUserSharedFiles(): string[] {
		return [...this.userShared];
	}

	getExcludedFiles(): string[] {
		return [...this.excluded];
	}

	resolveSharedFile(fileName: string): string | undefined {
		return this.findByName(fileName)?.filePath;
	}

	isFromWatchedDirectory(filePath: string): boolean {
		if (!this.watchedDir) return false;
		return isDirectChild(filePath, this.watchedDir);
	}

	addListener(listener: ShareChangeListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Swaps the watched directory (`null` stops directory sharing). Files of
	 * the old directory leave management and are de-listed by the next pass;
	 * files of the new one are no longer excluded. Registry calls happen in
	 * the scheduled pass, not here.
	 */
	async setWatchedDirectory(dirPath: string | null): Promise<void> {
		const next = dirPath ? normalizePath(dirPath) : null;
		const previous = this.watchedDir;
		// Listing the old directory also catches files a pass is registering.
		const leaving = previous ? await listRegularFiles(previous) : [];
		const arriving = next ? await this.scanDirectory(next) : [];

		if (previous) this.releaseDirectory(previous, leaving);
		this.watchedDir = next;
		for (const filePath of arriving) {
			this.excluded.delete(filePath);
			this.departing.delete(filePath);
		}

		this.changePending = true;
		this.logger.info(
			next ? "Watching new directory" : "Directory sharing stopped",
			next ? { dir: next } : undefined,
		);
		this.requestReconcile();
	}

	/**
	 * Shares one file explicitly. Rejects with `NameConflictError` when a
	 * different file of the same name is already listed; the existing listing
	 * is left alone.
	 */
	async addFile(filePath: string): Promise<ListingId> {
		const target = normalizePath(filePath);
		const fileName = path.basename(target);
		const holder = this.findByName(fileName);
		if (holder) {
			if (holder.filePath !== target) {
				this.logger.warn("Name already shared", {
					fileName,
					by: holder.filePath,
				});
				throw new NameConflictError(fileName);
			}
			this.markUserShared(target);
			return holder.id;
		}
		if (!(await isShareableFile(target))) {
			throw new FileUnavailableError(target);
		}

		let id: ListingId;
		try {
			id = await this.registry.register(
				this.ownerId,
				fileName,
				this.ownerAddress,
				this.ownerPort,
			);
		} catch (error) {
			// A pass may have listed the same file while the call was out.
			const raced = this.findByName(fileName);
			if (error instanceof NameConflictError && raced?.filePath === target) {
				this.markUserShared(target);
				this.emitChange();
				return raced.id;
			}
			this.logger.error("Register file failed", {
				file: target,
				error: errorMessage(error),
			});
			throw error;
		}

		this.markUserShared(target);
		this.listed.set(id, target);
		this.logger.info("Registered", { file: target, id });
		this.emitChange();
		return id;
	}

	/**
	 * Stops sharing `filePath` now; it may come back through the watched
	 * directory. A pass in flight skips the path and goes around again.
	 */
	async removeFile(filePath: string): Promise<void> {
		const target = normalizePath(filePath);
		this.userShared.delete(target);
		this.withdrawn.add(target);
		this.relisting = this.relisting.filter((listed) => listed !== target);
		if (this.running) this.changePending = true;
		const entry = this.findByPath(target);
		if (!entry) return;

		this.listed.delete(entry.id);
		try {
			await this.registry.unregister(entry.id, this.ownerId);
			this.logger.info("De-listed", { file: target, id: entry.id });
		} catch (error) {
			this.logger.error("Immediate de-list failed", {
				file: target,
				id: entry.id,
				error: errorMessage(error),
			});
		} finally {
			this.emitChange();
		}
	}

	/**
	 * Stops sharing `filePath` and keeps directory scans from listing it
	 * again.
	 */
	async excludeFile(filePath: string): Promise<void> {
		const target = normalizePath(filePath);
		this.excluded.add(target);
		this.userShared.delete(target);
		this.departing.delete(target);
		await this.removeFile(target);
	}

	/**
	 * Converges the registration table on the desired set. Returns at once
	 * when another pass holds the guard.
	 */
	async reconcile(): Promise<void> {
		if (this.running) return;
		const pass = this.runPasses();
		this.running = pass;
		try {
			await pass;
		} finally {
			this.running = null;
			this.emitChange();
		}
	}

	/**
	 * Schedules a pass on the engine's single task slot; repeated requests
	 * coalesce.
	 */
	requestReconcile(): void {
		if (this.scheduled) return;
		this.scheduled = new Promise<void>((resolve) => setImmediate(resolve))
			.then(() => {
				this.scheduled = null;
				return this.reconcile();
			})
			.catch((error: unknown) => {
				this.logger.error("Scheduled reconcile failed", {
					error: errorMessage(error),
				});
			});
	}

	/** Resolves once no pass is running or scheduled. */
	async whenIdle(): Promise<void> {
		while (this.scheduled || this.running) {
			await (this.scheduled ?? this.running);
		}
	}

	/**
	 * Starts periodic passes, the first one immediately. Without a period,
	 * one is derived from the registry lease. Returns the period in seconds,
	 * capped at what a timer can hold.
	 */
	async startMonitoring(periodSeconds?: number): Promise<number> {
		this.stopTimer();
		const period = Math.min(
			MAX_HEARTBEAT_SECONDS,
			periodSeconds ?? heartbeatPeriodSeconds(await this.leaseSeconds()),
		);
		this.timer = setInterval(() => this.requestReconcile(), period * 1000);
		this.requestReconcile();
		this.logger.info("Monitoring shares", { periodSeconds: period });
		return period;
	}

	async stop(): Promise<void> {
		this.stopTimer();
		await this.whenIdle();
	}

	/** Best-effort bulk de-listing, used when the peer goes offline. */
	async disconnect(): Promise<void> {
		await this.stop();
		try {
			await this.registry.disconnect(this.ownerId);
			this.logger.info("Disconnected from registry");
		} catch (error) {
			this.logger.warn("Disconnect failed", { error: errorMessage(error) });
		}
		this.listed.clear();
		this.emitChange();
	}

	private async runPasses(): Promise<void> {
		let retries = 0;
		let needsRetry: boolean;
		do {
			needsRetry = false;
			this.changePending = false;
			this.withdrawn.clear();
			try {
				const lost = await this.reconcileOnce();
				if (lost) {
					needsRetry = retries < this.maxRetries;
					retries += 1;
				}
			} catch (error) {
				if (error instanceof RegistryUnavailableError) {
					this.logger.warn(
						"Registry unreachable; will retry on the next pass",
						{ error: errorMessage(error) },
					);
				} else {
					this.logger.error("Share sync failed", {
						error: errorMessage(error),
					});
				}
			}
		} while (needsRetry || this.changePending);
	}

	/**
	 * One iteration of the pass. Returns true when the registry lost our
	 * listings.
	 */
	private async reconcileOnce(): Promise<boolean> {
		const desired = await this.computeDesired();

		for (const filePath of desired) {
			await this.registerPath(filePath);
		}

		for (const [id, filePath] of [...this.listed]) {
			if (await this.shouldKeep(filePath, desired)) continue;
			try {
				await this.registry.unregister(id, this.ownerId);
				if (this.listed.get(id) === filePath) this.listed.delete(id);
				this.logger.info("De-listed", { file: filePath, id });
			} catch (error) {
				this.logger.warn("De-list failed; keeping entry for a later pass", {
					file: filePath,
					id,
					error: errorMessage(error),
				});
			}
		}

		const stillListed = new Set(this.listed.values());
		for (const filePath of [...this.departing]) {
			if (!stillListed.has(filePath)) this.departing.delete(filePath);
		}

		if (this.listed.size === 0) return false;
		const alive = await this.registry.heartbeat(this.ownerId);
		if (alive) return false;
		this.logger.warn("Registry lost this peer's listings; re-registering", {
			listed: this.listed.size,
		});
		this.relisting = [...this.listed.values()];
		this.listed.clear();
		return true;
	}

	private async computeDesired(): Promise<Set<string>> {
		const scanned: string[] = [];
		const dir = this.watchedDir;
		if (dir) {
			if (await directoryExists(dir)) {
				scanned.push(...(await this.scanDirectory(dir)));
			} else if (this.watchedDir === dir) {
				this.logger.warn(
					"Watched directory is gone; directory sharing stopped",
					{ dir },
				);
				this.releaseDirectory(dir);
				this.watchedDir = null;
			}
		}

		// Registration order decides who keeps a name: files that held one
		// before a registry loss go first, then current and user-added ones.
		const desired = new Set<string>();
		const previous = this.relisting;
		this.relisting = [];
		for (const filePath of [...previous, ...this.listed.values()]) {
			if (!this.departing.has(filePath)) desired.add(filePath);
		}
		for (const filePath of this.userShared) desired.add(filePath);
		for (const filePath of scanned) desired.add(filePath);
		for (const filePath of this.excluded) desired.delete(filePath);

		for (const filePath of [...desired]) {
			if (await isShareableFile(filePath)) continue;
			desired.delete(filePath);
			this.userShared.delete(filePath);
		}
		return desired;
	}

	private async scanDirectory(dir: string): Promise<string[]> {
		if (!(await directoryExists(dir))) return [];
		const matcher = await loadIgnoreMatcher(dir, this.ignorePatterns);
		return listShareableFiles(dir, matcher);
	}

	private async registerPath(filePath: string): Promise<void> {
		if (this.findByPath(filePath)) return;
		if (this.withdrawn.has(filePath) || this.excluded.has(filePath)) return;
		const fileName = path.basename(filePath);
		const holder = this.findByName(fileName);
		if (holder) {
			this.logger.warn("Skipping file; name already shared", {
				file: filePath,
				by: holder.filePath,
			});
			return;
		}
		try {
			const id = await this.registry.register(
				this.ownerId,
				fileName,
				this.ownerAddress,
				this.ownerPort,
			);
			this.listed.set(id, filePath);
			this.logger.info("Registered", { file: filePath, id });
		} catch (error) {
			if (error instanceof RegistryUnavailableError) throw error;
			if (error instanceof NameConflictError) {
				this.logger.warn("Skipping file; registry reports name conflict", {
					file: filePath,
				});
				return;
			}
			this.logger.error("Registration failed", {
				file: filePath,
				error: errorMessage(error),
			});
		}
	}

	/** Entries added by the user while the pass was running stay listed. */
	private async shouldKeep(
		filePath: string,
		desired: Set<string>,
	): Promise<boolean> {
		if (this.excluded.has(filePath)) return false;
		if (this.withdrawn.has(filePath)) return false;
		if (!desired.has(filePath) && !this.userShared.has(filePath)) return false;
		if (await isShareableFile(filePath)) return true;
		this.userShared.delete(filePath);
		return false;
	}

	private async leaseSeconds(): Promise<number> {
		try {
			return await this.registry.getLeaseSeconds();
		} catch (error) {
			this.logger.warn("Could not read registry lease; using default", {
				leaseSeconds: DEFAULT_LEASE_SECONDS,
				error: errorMessage(error),
			});
			return DEFAULT_LEASE_SECONDS;
		}
	}

	private markUserShared(filePath: string): void {
		this.excluded.delete(filePath);
		this.departing.delete(filePath);
		this.withdrawn.delete(filePath);
		this.userShared.add(filePath);
	}

	/**
	 * The directory's files leave management; listed ones are de-listed by
	 * the next pass.
	 */
	private releaseDirectory(dir: string, leaving: string[] = []): void {
		for (const filePath of this.userShared) {
			if (isDirectChild(filePath, dir)) this.userShared.delete(filePath);
		}
		for (const filePath of this.excluded) {
			if (isDirectChild(filePath, dir)) this.excluded.delete(filePath);
		}
		const managed = [...this.listed.values(), ...this.relisting, ...leaving];
		for (const filePath of managed) {
			if (isDirectChild(filePath, dir)) this.departing.add(filePath);
		}
	}

	private findByName(fileName: string): RegisteredFile | undefined {
		for (const [id, filePath] of this.listed) {
			if (path.basename(filePath) === fileName) return { id, filePath };
		}
		return undefined;
	}

	private findByPath(filePath: string): RegisteredFile | undefined {
		for (const [id, listedPath] of this.listed) {
			if (listedPath === filePath) return { id, filePath };
		}
		return undefined;
	}

	private stopTimer(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private emitChange(): void {
		const files = this.getSharedFiles();
		for (const listener of this.listeners) {
			try {
				listener(files);
			} catch (error) {
				this.logger.error("Share listener failed", {
					error: errorMessage(error),
				});
			}
		}
	}
}
