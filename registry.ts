import { NameConflictError } from "./errors.js";
import type { Listing, ListingId, OwnerInfo } from "./types.js";

/**
 * The remote service that records which peer owns which file. Transport
 * failures are reported as `RegistryUnavailableError`.
 */
export interface Registry {
	/** Rejects with `NameConflictError` when the owner lists `fileName`. */
	register(
		ownerId: string,
		fileName: string,
		ownerAddress: string,
		ownerPort: number,
	): Promise<ListingId>;
	/** No-op when the listing is already gone. */
	unregister(listingId: ListingId, ownerId: string): Promise<void>;
	/** Owner address and port are withheld. */
	search(query: string): Promise<Listing[]>;
	getOwner(listingId: ListingId): Promise<OwnerInfo | undefined>;
	getLeaseSeconds(): Promise<number>;
	/** `false` means the registry holds no listings for this owner. */
	heartbeat(ownerId: string): Promise<boolean>;
	disconnect(ownerId: string): Promise<void>;
}

export const DEFAULT_LEASE_SECONDS = 60;

interface StoredListing extends OwnerInfo {
	id: ListingId;
	ownerId: string;
	refreshedAt: number;
}

export interface MemoryRegistryOptions {
	leaseSeconds?: number;
	now?: () => number;
}

/** In-process registry; listings live until reaped or de-listed. */
export class MemoryRegistry implements Registry {
	private readonly listings = new Map<ListingId, StoredListing>();
	private nextId = 1;
	private readonly leaseSeconds: number;
	private readonly now: () => number;

	constructor(options: MemoryRegistryOptions = {}) {
		this.leaseSeconds = options.leaseSeconds ?? DEFAULT_LEASE_SECONDS;
		this.now = options.now ?? Date.now;
	}

	async register(
		ownerId: string,
		fileName: string,
		ownerAddress: string,
		ownerPort: number,
	): Promise<ListingId> {
		for (const listing of this.listings.values()) {
			if (listing.ownerId === ownerId && listing.fileName === fileName) {
				throw new NameConflictError(fileName);
			}
		}
		const id = this.nextId++;
		this.listings.set(id, {
			id,
			ownerId,
			fileName,
			ownerAddress,
			ownerPort,
			refreshedAt: this.now(),
		});
		return id;
	}

	async unregister(listingId: ListingId, ownerId: string): Promise<void> {
		const listing = this.listings.get(listingId);
		if (listing?.ownerId === ownerId) {
			this.listings.delete(listingId);
		}
	}

	async search(query: string): Promise<Listing[]> {
		const needle = query.trim().toLowerCase();
		const results: Listing[] = [];
		for (const listing of this.listings.values()) {
			if (listing.fileName.toLowerCase().includes(needle)) {
				results.push({ id: listing.id, fileName: listing.fileName });
			}
		}
		return results;
	}

	async getOwner(listingId: ListingId): Promise<OwnerInfo | undefined> {
		const listing = this.listings.get(listingId);
		if (!listing) return undefined;
		return {
			fileName: listing.fileName,
			ownerAddress: listing.ownerAddress,
			ownerPort: listing.ownerPort,
		};
	}

	async getLeaseSeconds(): Promise<number> {
		return this.leaseSeconds;
	}

	async heartbeat(ownerId: string): Promise<boolean> {
		const refreshedAt = this.now();
		let refreshed = false;
		for (const listing of this.listings.values()) {
			if (listing.ownerId !== ownerId) continue;
			listing.refreshedAt = refreshedAt;
			refreshed = true;
		}
		return refreshed;
	}

	async disconnect(ownerId: string): Promise<void> {
		this.forgetOwner(ownerId);
	}

	/** Drops listings not refreshed within the lease. Returns how many went. */
	reap(): number {
		const cutoff = this.now() - this.leaseSeconds * 1000;
		let removed = 0;
		for (const [id, listing] of this.listings) {
			if (listing.refreshedAt < cutoff) {
				this.listings.delete(id);
				removed += 1;
			}
		}
		return removed;
	}

	forgetOwner(ownerId: string): void {
		for (const [id, listing] of this.listings) {
			if (listing.ownerId === ownerId) this.listings.delete(id);
		}
	}

	listingsFor(ownerId: string): Listing[] {
		return [...this.listings.values()]
			.filter((listing) => listing.ownerId === ownerId)
			.map((listing) => ({ id: listing.id, fileName: listing.fileName }));
	}
}
