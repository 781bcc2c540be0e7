/**
 * MemoryLedger — in-process custody and atomic host.
 *
 * Holds vault balances and mint supplies in maps of immutable entries, so a
 * snapshot is a shallow copy of both maps. `atomic()` restores the snapshot
 * when the body returns `err` or throws, and queues scopes behind each other.
 */

import type {
	AtomicHost,
	BurnRequest,
	Custodian,
	MintRequest,
	TransferRequest,
} from "../custody/types.js";
import { TokenAmount } from "../math/fixed-point.js";
import { U64_MAX } from "../math/uint.js";
import {
	InsufficientBalanceError,
	InvalidArgumentError,
	type PoolError,
	UnauthorizedError,
} from "../shared/errors.js";
import type { AuthorityId, MintId, VaultId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";

interface VaultEntry {
	readonly mint: MintId;
	readonly owner: AuthorityId;
	readonly amount: bigint;
}

interface MintEntry {
	readonly authority: AuthorityId;
	readonly supply: bigint;
}

export interface RollbackParticipant {
	checkpoint(): () => void;
}

export class MemoryLedger implements Custodian, AtomicHost {
	private vaults: Map<VaultId, VaultEntry> = new Map();
	private mints: Map<MintId, MintEntry> = new Map();
	private readonly participants: RollbackParticipant[] = [];
	private scopes: Promise<void> = Promise.resolve();

	// ── Setup ──────────────────────────────────────────────────────

	createMint(mint: MintId, authority: AuthorityId): void {
		if (this.mints.has(mint)) {
			throw new InvalidArgumentError(`Mint ${mint} already exists`, { mint });
		}
		this.mints.set(mint, { authority, supply: 0n });
	}

	createVault(vault: VaultId, mint: MintId, owner: AuthorityId): void {
		if (this.vaults.has(vault)) {
			throw new InvalidArgumentError(`Vault ${vault} already exists`, { vault });
		}
		if (!this.mints.has(mint)) {
			throw new InvalidArgumentError(`Unknown mint ${mint}`, { mint });
		}
		this.vaults.set(vault, { mint, owner, amount: 0n });
	}

	hasVault(vault: VaultId): boolean {
		return this.vaults.has(vault);
	}

	/** Fund a vault out of thin air, growing its mint's supply. */
	credit(vault: VaultId, amount: bigint): void {
		const entry = this.requireVault(vault);
		const mint = this.requireMint(entry.mint);
		this.vaults.set(vault, { ...entry, amount: this.checkedAdd(entry.amount, amount) });
		this.mints.set(entry.mint, { ...mint, supply: this.checkedAdd(mint.supply, amount) });
	}

	balanceOf(vault: VaultId): bigint {
		return this.requireVault(vault).amount;
	}

	supplyOf(mint: MintId): bigint {
		return this.requireMint(mint).supply;
	}

	// ── Custodian ──────────────────────────────────────────────────

	async balance(vault: VaultId): Promise<Result<TokenAmount, PoolError>> {
		const entry = this.vaults.get(vault);
		if (!entry) return err(new InvalidArgumentError(`Unknown vault ${vault}`, { vault }));
		return ok(TokenAmount.of(entry.amount));
	}

	async supply(mint: MintId): Promise<Result<TokenAmount, PoolError>> {
		const entry = this.mints.get(mint);
		if (!entry) return err(new InvalidArgumentError(`Unknown mint ${mint}`, { mint }));
		return ok(TokenAmount.of(entry.supply));
	}

	async transfer(request: TransferRequest): Promise<Result<void, PoolError>> {
		const from = this.vaults.get(request.from);
		const to = this.vaults.get(request.to);
		if (!from || !to) {
			return err(
				new InvalidArgumentError("Unknown vault in transfer", { from: request.from, to: request.to }),
			);
		}
		if (from.mint !== to.mint) {
			return err(
				new InvalidArgumentError("Cannot transfer between vaults of different mints", {
					from: request.from,
					to: request.to,
				}),
			);
		}
		if (from.owner !== request.authority) {
			return err(
				new UnauthorizedError(`${request.authority} does not own ${request.from}`, {
					vault: request.from,
					authority: request.authority,
				}),
			);
		}
		const amount = request.amount.raw;
		if (from.amount < amount) {
			return err(
				new InsufficientBalanceError(`Insufficient balance in ${request.from}`, {
					vault: request.from,
					balance: from.amount.toString(),
					amount: amount.toString(),
				}),
			);
		}
		if (request.from === request.to) return ok(undefined);

		this.vaults.set(request.from, { ...from, amount: from.amount - amount });
		this.vaults.set(request.to, { ...to, amount: this.checkedAdd(to.amount, amount) });
		return ok(undefined);
	}

	async mint(request: MintRequest): Promise<Result<void, PoolError>> {
		const mint = this.mints.get(request.mint);
		const to = this.vaults.get(request.to);
		if (!mint || !to || to.mint !== request.mint) {
			return err(
				new InvalidArgumentError("Unknown mint or vault in mint", { mint: request.mint, to: request.to }),
			);
		}
		if (mint.authority !== request.authority) {
			return err(
				new UnauthorizedError(`${request.authority} is not the authority of ${request.mint}`, {
					mint: request.mint,
					authority: request.authority,
				}),
			);
		}
		const amount = request.amount.raw;
		this.mints.set(request.mint, { ...mint, supply: this.checkedAdd(mint.supply, amount) });
		this.vaults.set(request.to, { ...to, amount: this.checkedAdd(to.amount, amount) });
		return ok(undefined);
	}

	async burn(request: BurnRequest): Promise<Result<void, PoolError>> {
		const mint = this.mints.get(request.mint);
		const from = this.vaults.get(request.from);
		if (!mint || !from || from.mint !== request.mint) {
			return err(
				new InvalidArgumentError("Unknown mint or vault in burn", {
					mint: request.mint,
					from: request.from,
				}),
			);
		}
		if (from.owner !== request.authority) {
			return err(
				new UnauthorizedError(`${request.authority} does not own ${request.from}`, {
					vault: request.from,
					authority: request.authority,
				}),
			);
		}
		const amount = request.amount.raw;
		if (from.amount < amount) {
			return err(
				new InsufficientBalanceError(`Insufficient balance in ${request.from}`, {
					vault: request.from,
					balance: from.amount.toString(),
					amount: amount.toString(),
				}),
			);
		}
		this.vaults.set(request.from, { ...from, amount: from.amount - amount });
		this.mints.set(request.mint, { ...mint, supply: mint.supply - amount });
		return ok(undefined);
	}

	// ── AtomicHost ─────────────────────────────────────────────────

	/**
	 * Register in-process state that must roll back with the ledger, such as
	 * a venue's order log. `checkpoint()` runs when a scope opens and returns
	 * the function that restores that point.
	 */
	enlist(participant: RollbackParticipant): void {
		this.participants.push(participant);
	}

	/** Scopes run one at a time, so a rollback never restores over another scope's effects. */
	atomic<T>(fn: () => Promise<Result<T, PoolError>>): Promise<Result<T, PoolError>> {
		const scope = this.scopes.then(() => this.runScope(fn));
		this.scopes = scope.then(
			() => undefined,
			() => undefined,
		);
		return scope;
	}

	private async runScope<T>(fn: () => Promise<Result<T, PoolError>>): Promise<Result<T, PoolError>> {
		const vaults = new Map(this.vaults);
		const mints = new Map(this.mints);
		const restores = this.participants.map((participant) => participant.checkpoint());
		const rollback = (): void => {
			this.vaults = vaults;
			this.mints = mints;
			for (const restore of restores) restore();
		};
		try {
			const result = await fn();
			if (!result.ok) rollback();
			return result;
		} catch (thrown) {
			rollback();
			throw thrown;
		}
	}

	// ── Internal ───────────────────────────────────────────────────

	private requireVault(vault: VaultId): VaultEntry {
		const entry = this.vaults.get(vault);
		if (!entry) throw new InvalidArgumentError(`Unknown vault ${vault}`, { vault });
		return entry;
	}

	private requireMint(mint: MintId): MintEntry {
		const entry = this.mints.get(mint);
		if (!entry) throw new InvalidArgumentError(`Unknown mint ${mint}`, { mint });
		return entry;
	}

	private checkedAdd(a: bigint, b: bigint): bigint {
		const sum = a + b;
		if (b < 0n || sum > U64_MAX) {
			throw new InvalidArgumentError("Token balance out of range", { a: a.toString(), b: b.toString() });
		}
		return sum;
	}
}
