export type ListingId = number;

export interface Listing {
	id: ListingId;
	fileName: string;
}

export interface OwnerInfo {
	fileName: string;
	ownerAddress: string;
	ownerPort: number;
}

export type RegistrationTable = ReadonlyMap<ListingId, string>;

export type ShareChangeListener = (sharedFiles: string[]) => void;

export interface SharedFileLookup {
	resolveSharedFile(fileName: string): string | undefined;
}

export interface TransferResult {
	fileName: string;
	destination: string;
	expectedBytes: number;
	receivedBytes: number;
	complete: boolean;
}
