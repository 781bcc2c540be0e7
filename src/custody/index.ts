export type {
	AtomicHost,
	BurnRequest,
	Custodian,
	MintRequest,
	TransferRequest,
} from "./types.js";
