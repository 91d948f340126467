/**
 * UndoLog — the transaction boundary shared by every store.
 *
 * Each store write registers a compensating action while a transaction is
 * open. Rolling back replays them newest first, so partial drains made
 * earlier in a settlement are restored exactly. Transactions nest: an inner
 * commit folds its actions into the enclosing frame.
 */

import type { Result } from "../shared/result.js";

type Undo = () => void;

export class UndoLog {
	private readonly frames: Undo[][] = [];

	/** True while at least one transaction is open. */
	get active(): boolean {
		return this.frames.length > 0;
	}

	get depth(): number {
		return this.frames.length;
	}

	begin(): void {
		this.frames.push([]);
	}

	commit(): void {
		const frame = this.frames.pop();
		if (!frame) throw new Error("UndoLog.commit: no open transaction");
		const parent = this.frames.at(-1);
		if (parent) parent.push(...frame);
	}

	rollback(): void {
		const frame = this.frames.pop();
		if (!frame) throw new Error("UndoLog.rollback: no open transaction");
		for (let i = frame.length - 1; i >= 0; i--) {
			frame[i]?.();
		}
	}

	/** Registers a compensating action. Outside a transaction writes are final. */
	record(undo: Undo): void {
		this.frames.at(-1)?.push(undo);
	}

	/**
	 * Runs `fn` in a transaction: commits on ok, rolls back on err, rolls back
	 * and rethrows on a throw.
	 *
	 * @example
	 * ```ts
	 * const result = undo.atomic(() => settleAllFees(...));
	 * ```
	 */
	atomic<T, E>(fn: () => Result<T, E>): Result<T, E> {
		this.begin();
		let result: Result<T, E>;
		try {
			result = fn();
		} catch (error) {
			this.rollback();
			throw error;
		}
		if (result.ok) this.commit();
		else this.rollback();
		return result;
	}

	// ── Tracked collection writes ──────────────────────────────────

	/** map.set or, for `undefined`, map.delete, with the previous entry restored on rollback. */
	setEntry<K, V extends NonNullable<unknown>>(map: Map<K, V>, key: K, value: V | undefined): void {
		const previous = map.get(key);
		if (value === undefined) map.delete(key);
		else map.set(key, value);
		this.record(() => {
			if (previous === undefined) map.delete(key);
			else map.set(key, previous);
		});
	}

	addMember<V>(set: Set<V>, value: V): void {
		if (set.has(value)) return;
		set.add(value);
		this.record(() => set.delete(value));
	}

	deleteMember<V>(set: Set<V>, value: V): void {
		if (!set.delete(value)) return;
		this.record(() => set.add(value));
	}
}
