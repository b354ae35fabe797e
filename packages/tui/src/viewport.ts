/**
 * @file 块视口与滚动控制
 *
 * BlockViewport 在设备的 [top, bottom] 行之间显示一串内容块（如帖子），
 * 为每个导航动作在两种更新方式之间做选择：
 * - 滚动区域平移：每移动一行只需一个 IND/RI 指令，然后只绘制露出的行
 * - 整屏重绘：移动距离超过视口高度时，一次重绘比逐行平移更省字节
 *
 * 可见块的首行带有序号标签。positions 记录每个未完全滚出顶部的块的首行行号，
 * 只用于判断两次绘制之间序号是否发生了变化；变化时需要重绘带标签的行。
 *
 * 向前滚动露出的空行会作为 needsData 返回，由调用方拉取后续内容后用 fill() 补画。
 */

import type { Painter } from "./painter.js";
import { BoundingRectangle } from "./rect.js";
import { replaceAt, type StyledLine } from "./styled-text.js";

/** 偏移量上限，同时是"需要更多内容"的哨兵 */
export const MAX_OFFSET = 0xffffffff;

/** 一个成块显示的内容单元，构造后不可变 */
export interface ContentBlock {
	/** 去重用的标识，追加时跳过已存在的 key */
	readonly key?: string;
	readonly lines: readonly StyledLine[];
	/** 序号标签在首行中的列偏移（默认 3） */
	readonly labelOffset?: number;
}

/** 导航动作的结果 */
export interface ScrollResult {
	/** 视口是否移动 */
	moved: boolean;
	/** 没有内容可画、需要拉取后续内容的行 */
	needsData: number[];
}

/** 视口位置 */
export interface ViewportOptions {
	/** 第一行（含） */
	top: number;
	/** 最后一行（含） */
	bottom: number;
}

/** 序号标签文本，没有序号时画回边框 */
export function ordinalLabel(label: number | undefined): string {
	return label === undefined ? "───" : `┤${label}├`;
}

function sameSequence(a: Iterable<number>, b: Iterable<number>): boolean {
	const left = [...a];
	const right = [...b];
	return left.length === right.length && left.every((value, i) => value === right[i]);
}

const NO_MOVE: ScrollResult = Object.freeze({ moved: false, needsData: [] });

/**
 * 可滚动的块视口。
 */
export class BlockViewport<B extends ContentBlock> {
	readonly top: number;
	readonly bottom: number;
	private readonly painter: Painter;
	private blockList: B[] = [];
	private scrollOffset = 0;
	/** 行号 -> 块索引，按块顺序插入 */
	private positionMap = new Map<number, number>();

	constructor(painter: Painter, options: ViewportOptions) {
		if (options.bottom < options.top) {
			throw new Error(`Viewport bottom ${options.bottom} is above its top ${options.top}!`);
		}
		this.painter = painter;
		this.top = options.top;
		this.bottom = options.bottom;
	}

	get blocks(): readonly B[] {
		return this.blockList;
	}

	/** 从第一个块顶部到视口顶部的行数 */
	get offset(): number {
		return this.scrollOffset;
	}

	get positions(): ReadonlyMap<number, number> {
		return this.positionMap;
	}

	/** 视口高度（行数） */
	get height(): number {
		return this.bottom - this.top + 1;
	}

	/** 替换全部内容块并回到顶部，不绘制 */
	setBlocks(blocks: readonly B[]): void {
		this.blockList = [...blocks];
		this.scrollOffset = 0;
		this.positionMap = this.computePositions();
	}

	/** 追加内容块，已存在的 key 会被跳过；返回实际追加的数量 */
	appendBlocks(blocks: readonly B[]): number {
		const known = new Set<string>();
		for (const block of this.blockList) {
			if (block.key !== undefined) known.add(block.key);
		}

		let added = 0;
		for (const block of blocks) {
			if (block.key !== undefined) {
				if (known.has(block.key)) continue;
				known.add(block.key);
			}
			this.blockList.push(block);
			added++;
		}

		// Appending can only extend the ordinal sequence, so no label needs repainting.
		this.positionMap = this.computePositions();
		return added;
	}

	/** 计算每个未完全滚出顶部的块的首行行号 */
	computePositions(): Map<number, number> {
		const positions = new Map<number, number>();
		let row = this.top - this.scrollOffset;

		// No early exit past the bottom: blocks entering or leaving below must not
		// look like an ordinal change.
		for (let i = 0; i < this.blockList.length; i++) {
			const height = this.blockList[i].lines.length;
			if (row + height > this.top) {
				positions.set(row, i);
			}
			row += height;
		}
		return positions;
	}

	/** 更新偏移并重算 positions，返回序号是否变化 */
	private setOffset(offset: number): boolean {
		this.scrollOffset = offset;
		const next = this.computePositions();
		const changed = !sameSequence(this.positionMap.values(), next.values());
		this.positionMap = next;
		return changed;
	}

	/** 块 index 之前所有块的总行数 */
	private blockStart(index: number): number {
		let start = 0;
		for (let i = 0; i < index && i < this.blockList.length; i++) {
			start += this.blockList[i].lines.length;
		}
		return start;
	}

	/** 块 index 的首行所在行号（可能在视口之外） */
	rowOfBlock(index: number): number {
		return this.top - this.scrollOffset + this.blockStart(index);
	}

	/**
	 * 返回某行所在块的分数索引：整数部分为块索引，小数部分为该行在块内的位置。
	 * 该行没有块时返回 undefined。
	 */
	blockAtRow(row: number): number | undefined {
		const located = this.locate(row);
		if (!located) return undefined;
		return located.index + located.line / this.blockList[located.index].lines.length;
	}

	private locate(row: number): { index: number; line: number; firstRow: number } | undefined {
		let firstRow = this.top - this.scrollOffset;
		for (let i = 0; i < this.blockList.length; i++) {
			const height = this.blockList[i].lines.length;
			if (row >= firstRow && row < firstRow + height) {
				return { index: i, line: row - firstRow, firstRow };
			}
			firstRow += height;
			if (firstRow > row) break;
		}
		return undefined;
	}

	/** 首行可见的块的序号（1 起始），其余返回 undefined */
	labelFor(index: number): number | undefined {
		const firstRow = this.rowOfBlock(index);
		if (firstRow < this.top || firstRow > this.bottom || this.positionMap.get(firstRow) !== index) {
			return undefined;
		}
		const first = this.positionMap.values().next();
		return first.done ? undefined : index - first.value + 1;
	}

	/** 按序号查找块，块必须与视口相交 */
	blockForOrdinal(ordinal: number): number | undefined {
		const first = this.positionMap.values().next();
		if (first.done) return undefined;
		const index = first.value + ordinal - 1;
		if (index < 0 || index >= this.blockList.length) return undefined;
		const firstRow = this.rowOfBlock(index);
		if (firstRow > this.bottom || firstRow + this.blockList[index].lines.length <= this.top) {
			return undefined;
		}
		return index;
	}

	private decoratedLine(index: number, line: number): StyledLine {
		const block = this.blockList[index];
		const content = block.lines[line];
		if (line !== 0) return content;
		return replaceAt(content, ordinalLabel(this.labelFor(index)), block.labelOffset ?? 3);
	}

	private rowRect(top: number, bottom: number): BoundingRectangle {
		return new BoundingRectangle({ top, bottom: bottom + 1, left: 1, right: this.painter.columns + 1 });
	}

	/** 绘制单行；该行没有内容时清空并返回 false */
	paintRow(row: number): boolean {
		const located = this.locate(row);
		if (!located) {
			this.painter.clearLine(row);
			return false;
		}
		this.painter.paint([this.decoratedLine(located.index, located.line)], this.rowRect(row, row));
		return true;
	}

	/** 依次绘制若干行，返回没有内容的行 */
	repaintRows(rows: Iterable<number>): number[] {
		const empty: number[] = [];
		for (const row of rows) {
			if (row < this.top || row > this.bottom) continue;
			if (!this.paintRow(row)) empty.push(row);
		}
		return empty;
	}

	/** 重绘 [from, to] 内所有带序号标签的行 */
	private repaintLabels(from: number, to: number): void {
		for (const row of this.positionMap.keys()) {
			if (row < from || row > to) continue;
			this.paintRow(row);
		}
	}

	/**
	 * 整屏重绘：从上到下画出所有可见块，清除没有块的行。
	 * 返回留空的连续行范围，供调用方拉取内容。
	 */
	fullRepaint(): { start: number; end: number } | undefined {
		this.positionMap = this.computePositions();
		this.painter.moveCursor(this.top, 1);

		let firstRow = this.top - this.scrollOffset;
		for (let i = 0; i < this.blockList.length; i++) {
			if (firstRow > this.bottom) break;
			const height = this.blockList[i].lines.length;
			if (firstRow + height <= this.top) {
				firstRow += height;
				continue;
			}

			const from = Math.max(firstRow, this.top);
			const to = Math.min(firstRow + height - 1, this.bottom);
			const lines: StyledLine[] = [];
			for (let row = from; row <= to; row++) {
				lines.push(this.decoratedLine(i, row - firstRow));
			}
			this.painter.paint(lines, this.rowRect(from, to));
			firstRow += height;
		}

		const unfilled = Math.max(firstRow, this.top);
		this.painter.clearRows(unfilled, this.bottom);
		this.painter.moveCursor(this.bottom, this.painter.columns);
		return unfilled <= this.bottom ? { start: unfilled, end: this.bottom } : undefined;
	}

	private fullRepaintResult(): ScrollResult {
		const missing = this.fullRepaint();
		const needsData: number[] = [];
		if (missing) {
			for (let row = missing.start; row <= missing.end; row++) needsData.push(row);
		}
		return { moved: true, needsData };
	}

	/** 内容下移 amount 行：平移后重绘变化的标签行和顶部露出的行 */
	private shiftTowardsStart(amount: number, labelsChanged: boolean): ScrollResult {
		this.painter.saveCursor();
		this.painter.shiftContentDown(this.top, this.bottom, amount);
		if (labelsChanged) {
			this.repaintLabels(this.top + amount, this.bottom);
		}
		const exposed: number[] = [];
		for (let row = this.top; row < this.top + amount; row++) exposed.push(row);
		const needsData = this.repaintRows(exposed);
		this.painter.restoreCursor();
		return { moved: true, needsData };
	}

	/** 内容上移 amount 行：平移后重绘变化的标签行和底部露出的行 */
	private shiftTowardsEnd(amount: number, labelsChanged: boolean): ScrollResult {
		this.painter.saveCursor();
		this.painter.shiftContentUp(this.top, this.bottom, amount);
		if (labelsChanged) {
			this.repaintLabels(this.top, this.bottom - amount);
		}
		const exposed: number[] = [];
		for (let row = this.bottom - amount + 1; row <= this.bottom; row++) exposed.push(row);
		const needsData = this.repaintRows(exposed);
		this.painter.restoreCursor();
		return { moved: true, needsData };
	}

	/** 向上滚动一行 */
	scrollUp(): ScrollResult {
		if (this.scrollOffset <= 0) return NO_MOVE;
		const labelsChanged = this.setOffset(this.scrollOffset - 1);
		return this.shiftTowardsStart(1, labelsChanged);
	}

	/** 向下滚动一行；露出的底行没有内容时在 needsData 中返回 */
	scrollDown(): ScrollResult {
		if (this.scrollOffset >= MAX_OFFSET) return NO_MOVE;
		const labelsChanged = this.setOffset(this.scrollOffset + 1);
		return this.shiftTowardsEnd(1, labelsChanged);
	}

	/**
	 * 回到顶部。
	 * 距离不超过视口高度时逐行平移并只重绘变化的行，否则整屏重绘。
	 */
	jumpToTop(): ScrollResult {
		const distance = this.scrollOffset;
		if (distance <= 0) return NO_MOVE;
		const labelsChanged = this.setOffset(0);
		if (distance <= this.height) {
			return this.shiftTowardsStart(distance, labelsChanged);
		}
		return this.fullRepaintResult();
	}

	/** 滚动到上一个块的首行（当前位于块中间时回到本块首行） */
	previousBlock(): ScrollResult {
		const at = this.blockAtRow(this.top);
		let which: number;
		if (at === undefined) {
			which = this.blockList.length - 1;
		} else {
			which = Math.floor(at);
			if (at === which) which--;
		}
		if (which < 0) which = 0;

		const moveAmount = this.scrollOffset - this.blockStart(which);
		if (moveAmount <= 0) return NO_MOVE;

		const labelsChanged = this.setOffset(this.scrollOffset - moveAmount);
		if (moveAmount <= this.height) {
			return this.shiftTowardsStart(moveAmount, labelsChanged);
		}
		return this.fullRepaintResult();
	}

	/**
	 * 滚动到下一个块的首行。越过最后一个块时停在它的末尾之后，
	 * 露出的行在 needsData 中返回。
	 */
	nextBlock(): ScrollResult {
		const at = this.blockAtRow(this.top);
		if (at === undefined) return NO_MOVE;

		const target = Math.min(this.blockStart(Math.floor(at) + 1), MAX_OFFSET);
		const moveAmount = target - this.scrollOffset;
		if (moveAmount <= 0) return NO_MOVE;

		const labelsChanged = this.setOffset(target);
		if (moveAmount <= this.height) {
			return this.shiftTowardsEnd(moveAmount, labelsChanged);
		}
		return this.fullRepaintResult();
	}

	/** 丢弃全部块，换成新内容并回到顶部，总是整屏重绘 */
	refresh(blocks: readonly B[]): ScrollResult {
		this.setBlocks(blocks);
		return this.fullRepaintResult();
	}

	/**
	 * 替换一个块（如展开内容警告后重建的块）并重绘它占据的可见行。
	 * 高度变化时其后的块也会移动，因此一直重绘到视口底部。
	 */
	replaceBlock(index: number, block: B): number[] {
		const previous = this.blockList[index];
		if (!previous) {
			throw new Error(`No block at index ${index}!`);
		}
		this.blockList[index] = block;
		this.positionMap = this.computePositions();

		const firstRow = this.rowOfBlock(index);
		const lastRow = block.lines.length === previous.lines.length ? firstRow + block.lines.length - 1 : this.bottom;
		const rows: number[] = [];
		for (let row = Math.max(firstRow, this.top); row <= Math.min(lastRow, this.bottom); row++) rows.push(row);

		this.painter.saveCursor();
		const needsData = this.repaintRows(rows);
		this.painter.restoreCursor();
		return needsData;
	}

	/**
	 * 拉取一次后续内容，追加到末尾，并补画之前留空的行。
	 * @returns 实际追加的块数
	 */
	async fill(rows: readonly number[], fetchMore: () => Promise<readonly B[]>): Promise<number> {
		if (rows.length === 0) return 0;
		const fetched = await fetchMore();
		const added = this.appendBlocks(fetched);

		this.painter.saveCursor();
		this.repaintRows(rows);
		this.painter.restoreCursor();
		return added;
	}
}
