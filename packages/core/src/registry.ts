/**
 * Channel registry — the dotted-name hierarchy under `root`.
 *
 * Each facade owns its own registry; nothing here is process-global.
 */

import { type Severity, meetsThreshold } from '@tributary/sdk';
import type { BoundSink } from './sink-factory.js';

export const ROOT_CHANNEL = 'root';

export interface ChannelNode {
	readonly name: string;
	/** Unset levels inherit from the nearest ancestor */
	level: Severity | undefined;
	propagate: boolean;
	readonly sinks: BoundSink[];
}

export interface ChannelRegistryOptions {
	rootLevel: Severity;
	/** Propagation for channels created without an explicit setting */
	defaultPropagate: boolean;
}

/** `undefined`, `''` and `root` all name the root channel */
export function normalizeChannelName(name: string | undefined): string {
	return name === undefined || name === '' ? ROOT_CHANNEL : name;
}

export class ChannelRegistry {
	readonly root: ChannelNode;
	private readonly defaultPropagate: boolean;
	private readonly nodes = new Map<string, ChannelNode>();

	constructor(options: ChannelRegistryOptions) {
		this.defaultPropagate = options.defaultPropagate;
		this.root = { name: ROOT_CHANNEL, level: options.rootLevel, propagate: false, sinks: [] };
		this.nodes.set(ROOT_CHANNEL, this.root);
	}

	/** Get or create the node for a channel name */
	node(name: string | undefined): ChannelNode {
		const key = normalizeChannelName(name);
		let node = this.nodes.get(key);
		if (!node) {
			node = { name: key, level: undefined, propagate: this.defaultPropagate, sinks: [] };
			this.nodes.set(key, node);
		}
		return node;
	}

	/** Level of the channel or its nearest ancestor with one set */
	effectiveLevel(name: string): Severity {
		for (const node of this.ancestry(name)) {
			if (node.level !== undefined) return node.level;
		}
		// Root always carries a level
		return this.root.level ?? 'INFO';
	}

	isEnabledFor(name: string, severity: Severity): boolean {
		return meetsThreshold(severity, this.effectiveLevel(name));
	}

	/**
	 * Nodes a record named `name` is handed to: the channel itself, then
	 * each existing ancestor, stopping after the first that does not propagate.
	 */
	*route(name: string): Generator<ChannelNode> {
		for (const node of this.ancestry(name)) {
			yield node;
			if (!node.propagate) return;
		}
	}

	/** Existing nodes from `name` up to root */
	private *ancestry(name: string): Generator<ChannelNode> {
		let current = normalizeChannelName(name);
		while (current !== ROOT_CHANNEL) {
			const node = this.nodes.get(current);
			if (node) yield node;
			const dot = current.lastIndexOf('.');
			current = dot === -1 ? ROOT_CHANNEL : current.slice(0, dot);
		}
		yield this.root;
	}
}
