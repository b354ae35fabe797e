/**
 * @file 讨论串结构
 *
 * 服务器返回某帖子的上文（ancestors，从起点到直接父帖的一条链）
 * 和下文（descendants，所有层级的回复）。buildThread 把它们组装成一棵树，
 * 节点保存在数组中，父子关系用下标表示；flattenThread 按显示顺序展开，
 * 并为每个帖子计算绘制连线所需的信息。
 */

import type { Context, Status } from "./schemas.js";

export interface ThreadNode {
	status: Status;
	/** 父节点下标，起点没有父节点 */
	parent?: number;
	/** 子节点下标，按回复顺序 */
	children: number[];
}

export interface Thread {
	nodes: ThreadNode[];
	/** 起点帖子的下标 */
	root: number;
	/** 被查看的帖子的下标 */
	focus: number;
}

/** 绘制讨论串连线所需的信息 */
export interface ThreadInfo {
	/** 缩进层级：上文链和当前帖子为 0，回复按深度递增 */
	level: number;
	/** 是否为被查看的帖子 */
	highlighted: boolean;
	/** 同一层级中上方是否连着父帖（上文链中的连接） */
	hasAncestors: boolean;
	/** 是否有回复 */
	hasDescendants: boolean;
	/** 是否从左侧连到上一层的父帖 */
	hasParent: boolean;
	/** 下方是否还有同一父帖的其他回复 */
	hasSiblings: boolean;
	/** 需要画竖线穿过的更外层层级 */
	siblingLevels: ReadonlySet<number>;
}

export interface ThreadEntry {
	index: number;
	status: Status;
	info: ThreadInfo;
}

/**
 * 由帖子和它的上下文组装讨论串。
 *
 * 上文必须是一条不分叉的链，否则抛出异常。找不到父帖的回复会被丢弃
 * （例如父帖对当前用户不可见）。
 */
export function buildThread(post: Status, context: Context): Thread {
	const nodes: ThreadNode[] = [];
	const ancestors = context.ancestors;

	if (ancestors.length > 0) {
		// The origin is the one ancestor whose parent is not part of the chain.
		const ids = new Set(ancestors.map((status) => status.id));
		const origins = ancestors.filter((status) => !status.in_reply_to_id || !ids.has(status.in_reply_to_id));
		if (origins.length !== 1) {
			throw new Error(`Thread for post ${post.id} has ${origins.length} origin posts`);
		}

		let current = origins[0];
		let remaining = ancestors.filter((status) => status !== current);
		nodes.push({ status: current, children: [] });

		while (remaining.length > 0) {
			const parentId = current.id;
			const next = remaining.filter((status) => status.in_reply_to_id === parentId);
			if (next.length !== 1) {
				throw new Error(`Thread for post ${post.id} has ${next.length} ancestors replying to ${parentId}`);
			}
			remaining = remaining.filter((status) => status.in_reply_to_id !== parentId);

			const parent = nodes.length - 1;
			nodes[parent].children.push(nodes.length);
			nodes.push({ status: next[0], parent, children: [] });
			current = next[0];
		}
	}

	const focus = nodes.length;
	if (focus > 0) {
		nodes[focus - 1].children.push(focus);
		nodes.push({ status: post, parent: focus - 1, children: [] });
	} else {
		nodes.push({ status: post, children: [] });
	}

	const byId = new Map<string, number>([[post.id, focus]]);
	let pending = context.descendants.filter((status) => status.id !== post.id);
	while (pending.length > 0) {
		let progressed = false;
		for (const status of pending) {
			if (!status.in_reply_to_id) {
				throw new Error(`Reply ${status.id} in thread ${post.id} does not reply to anything`);
			}
			const parent = byId.get(status.in_reply_to_id);
			if (parent === undefined || byId.has(status.id)) continue;

			const index = nodes.length;
			nodes.push({ status, parent, children: [] });
			nodes[parent].children.push(index);
			byId.set(status.id, index);
			progressed = true;
		}
		if (!progressed) break;
		pending = pending.filter((status) => !byId.has(status.id));
	}

	return { nodes, root: 0, focus };
}

/** 按显示顺序（先序遍历）展开讨论串 */
export function flattenThread(thread: Thread): ThreadEntry[] {
	const { nodes, focus } = thread;
	const entries: ThreadEntry[] = [];

	// Everything up to and including the focused post sits on level 0.
	const chain = new Set<number>();
	for (let index: number | undefined = focus; index !== undefined; index = nodes[index].parent) {
		chain.add(index);
	}

	const stack: Array<{ index: number; level: number; hasSiblings: boolean; open: ReadonlySet<number> }> = [
		{ index: thread.root, level: 0, hasSiblings: false, open: new Set() },
	];

	while (stack.length > 0) {
		const item = stack.pop();
		if (!item) break;
		const node = nodes[item.index];
		const inChain = chain.has(item.index);

		entries.push({
			index: item.index,
			status: node.status,
			info: {
				level: item.level,
				highlighted: item.index === focus,
				hasAncestors: inChain && node.parent !== undefined,
				hasDescendants: node.children.length > 0,
				hasParent: !inChain,
				hasSiblings: item.hasSiblings,
				siblingLevels: item.open,
			},
		});

		const childLevel = inChain && item.index !== focus ? 0 : item.level + 1;
		const childOpen = item.hasSiblings ? new Set([...item.open, item.level]) : item.open;
		// Push in reverse so the first reply is visited first.
		for (let i = node.children.length - 1; i >= 0; i--) {
			stack.push({
				index: node.children[i],
				level: childLevel,
				hasSiblings: i < node.children.length - 1,
				open: childOpen,
			});
		}
	}

	return entries;
}
