/**
 * @file 帖子列表屏幕的公共部分
 *
 * 时间线和讨论串都在 BlockViewport 中显示 PostBlock，共享滚动、
 * 按序号展开内容警告和按序号选择帖子的处理。
 */

import {
	type Action,
	BlockViewport,
	type NavigationStack,
	NULL_ACTION,
	type Screen,
	type ScrollResult,
	type TimelineAction,
} from "@slowterm/tui";
import type { SessionContext } from "../context.js";
import type { PostBlock } from "./post-block.js";

/** 序号 1-10 对应的选择键 */
const OPEN_KEYS = "1234567890";
/** 序号 1-10 对应的内容警告切换键（上档数字） */
const SPOILER_KEYS = "!@#$%^&*()";

export const HELP_STATUS = "Press '?' for help.";

/** 输入对应的序号操作 */
export function ordinalKey(data: string): { kind: "open" | "spoiler"; ordinal: number } | undefined {
	if (data.length !== 1) return undefined;
	const open = OPEN_KEYS.indexOf(data);
	if (open >= 0) return { kind: "open", ordinal: open + 1 };
	const toggle = SPOILER_KEYS.indexOf(data);
	if (toggle >= 0) return { kind: "spoiler", ordinal: toggle + 1 };
	return undefined;
}

export abstract class PostListScreen implements Screen {
	protected readonly nav: NavigationStack;
	protected readonly ctx: SessionContext;
	protected readonly viewport: BlockViewport<PostBlock>;
	/** 没有更多内容可拉取 */
	protected exhausted = false;

	constructor(nav: NavigationStack, ctx: SessionContext, top: number) {
		this.nav = nav;
		this.ctx = ctx;
		this.viewport = new BlockViewport<PostBlock>(nav.painter, { top, bottom: nav.rows });
	}

	abstract draw(): void;
	abstract handleInput(data: string): Promise<Action | undefined>;

	/** 拉取更多帖子，返回新块 */
	protected abstract fetchMore(): Promise<PostBlock[]>;

	/** 补画滚动后露出的空行 */
	protected async settle(result: ScrollResult): Promise<void> {
		if (result.needsData.length === 0 || this.exhausted) return;
		const added = await this.viewport.fill(result.needsData, () => this.fetchMore());
		if (added === 0) {
			this.exhausted = true;
		}
	}

	/** 已经没有内容、底行也已空出时不再往后滚 */
	private atEnd(): boolean {
		return this.exhausted && this.viewport.blockAtRow(this.viewport.bottom) === undefined;
	}

	/** 处理滚动类动作，其他动作返回 undefined */
	protected async scroll(action: TimelineAction | undefined): Promise<Action | undefined> {
		const { viewport } = this;
		switch (action) {
			case "scrollUp":
				await this.settle(viewport.scrollUp());
				return NULL_ACTION;
			case "scrollDown":
				if (!this.atEnd()) await this.settle(viewport.scrollDown());
				return NULL_ACTION;
			case "previousPost":
				await this.settle(viewport.previousBlock());
				return NULL_ACTION;
			case "nextPost":
				if (!this.atEnd()) await this.settle(viewport.nextBlock());
				return NULL_ACTION;
			case "top":
				await this.settle(viewport.jumpToTop());
				return NULL_ACTION;
			default:
				return undefined;
		}
	}

	/** 可见序号对应的块，不存在时返回 undefined */
	protected blockAt(ordinal: number): { index: number; block: PostBlock } | undefined {
		const index = this.viewport.blockForOrdinal(ordinal);
		if (index === undefined) return undefined;
		return { index, block: this.viewport.blocks[index] };
	}

	/** 展开或收起某个序号的内容警告 */
	protected async toggleSpoiler(ordinal: number): Promise<Action> {
		const found = this.blockAt(ordinal);
		if (!found || !found.block.hasSpoiler) return NULL_ACTION;
		const replaced = found.block.with({ showSpoiler: !found.block.spoilerShown });
		const empty = this.viewport.replaceBlock(found.index, replaced);
		await this.settle({ moved: false, needsData: empty });
		return NULL_ACTION;
	}

	/** 用新的帖子数据替换块（如喜欢之后） */
	protected replaceStatus(index: number, block: PostBlock): void {
		this.viewport.replaceBlock(index, block);
	}
}
