/**
 * @file 帖子块
 *
 * 把一条帖子排版成一个带框的内容块，供时间线和讨论串的视口显示。
 *
 * 块的结构（自上而下）：
 * - 上边框（序号标签由视口画在 labelOffset 处）
 * - 转发说明行（仅转发）
 * - 作者行
 * - 内容警告行（仅有警告时，反显）
 * - 正文；内容警告未展开时每个非空白字符显示为 *
 * - 每个附件一个内嵌方框，带下划线的文件名和替代文本
 * - 下边框，右侧是时间和互动统计，当前用户转发/喜欢/收藏过的项加粗
 *
 * 讨论串中的帖子按层级右移 3 列，左侧留出连线的位置。
 */

import type { MediaAttachment, Status, StatusCore, ThreadInfo } from "@slowterm/client";
import {
	account,
	boost,
	boxBottom,
	boxMiddle,
	boxTop,
	type ContentBlock,
	highlight,
	htmlToStyled,
	joinLines,
	pad,
	replaceAt,
	sanitize,
	spoiler,
	type StyledLine,
	styledLine,
	toDisplayable,
	wordWrap,
} from "@slowterm/tui";

export interface PostBlockOptions {
	/** 设备列数 */
	columns: number;
	/** 讨论串连线信息；时间线中的帖子没有 */
	info?: ThreadInfo;
	/** 展开内容警告 */
	showSpoiler?: boolean;
	/** 时间显示的时区，undefined 为本地时区 */
	timeZone?: string;
}

export class PostBlock implements ContentBlock {
	readonly key: string;
	readonly lines: readonly StyledLine[];
	readonly labelOffset: number;
	/** 原始条目（可能是转发） */
	readonly status: Status;
	/** 实际显示的帖子 */
	readonly post: StatusCore;
	readonly options: PostBlockOptions;

	constructor(status: Status, options: PostBlockOptions) {
		this.status = status;
		this.post = status.reblog ?? status;
		this.options = options;
		this.key = status.id;
		const level = options.info?.level ?? 0;
		this.labelOffset = 3 + 3 * level;
		this.lines = decorate(layoutPost(status, options), options.info);
	}

	get hasSpoiler(): boolean {
		return this.post.spoiler_text !== "";
	}

	get spoilerShown(): boolean {
		return this.options.showSpoiler ?? false;
	}

	/** 以新的帖子数据或展开状态重建 */
	with(changes: { status?: Status; showSpoiler?: boolean }): PostBlock {
		return new PostBlock(changes.status ?? this.status, {
			...this.options,
			showSpoiler: changes.showSpoiler ?? this.options.showSpoiler,
		});
	}
}

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** 形如 "Sat, Oct 5, 2024, 3:04:05 PM" 的时间 */
export function formatTimestamp(iso: string, timeZone?: string): string {
	const date = new Date(iso);
	if (Number.isNaN(date.getTime())) {
		return iso;
	}
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "numeric",
		day: "numeric",
		weekday: "short",
		hour: "numeric",
		minute: "2-digit",
		second: "2-digit",
	}).formatToParts(date);

	const values = new Map<string, string>();
	for (const part of parts) {
		values.set(part.type, part.value);
	}
	const number = (type: string): number => Number(values.get(type) ?? "0");

	// Reassembled by hand: ICU's own separators vary between versions.
	const month = MONTHS[number("month") - 1] ?? "";
	const weekday = values.get("weekday") ?? "";
	const hour24 = number("hour") % 24;
	const hour = hour24 % 12 === 0 ? 12 : hour24 % 12;
	const minute = String(number("minute")).padStart(2, "0");
	const second = String(number("second")).padStart(2, "0");
	const period = hour24 < 12 ? "AM" : "PM";
	return `${weekday}, ${month} ${number("day")}, ${number("year")}, ${hour}:${minute}:${second} ${period}`;
}

function bolded(on: boolean | undefined, text: string): string {
	return on ? `<b>${text}</b>` : text;
}

/** 下边框上的时间和互动统计 */
export function statsLine(post: StatusCore, timeZone?: string): StyledLine {
	const time = sanitize(formatTimestamp(post.created_at, timeZone));
	return highlight(
		`┤${time}├─┤${post.replies_count} C├─┤${bolded(post.reblogged, `${post.reblogs_count} B`)}├─┤${bolded(
			post.favourited,
			`${post.favourites_count} L`,
		)}├─┤${bolded(post.bookmarked, "S")}├`,
	);
}

/** 附件 URL 的最后一段 */
function attachmentName(media: MediaAttachment): string {
	const url = media.url ?? "";
	const path = url.split("?")[0];
	return path.slice(path.lastIndexOf("/") + 1) || media.type;
}

function wrapStyled(line: StyledLine, width: number): StyledLine[] {
	return wordWrap(line.text, line.attrs, width).map((wrapped) => styledLine(wrapped.text, wrapped.meta));
}

function layoutAttachment(media: MediaAttachment, width: number, hidden: boolean): StyledLine[] {
	const description = toDisplayable(media.description || "no description");
	const text = highlight(
		`<u>${sanitize(toDisplayable(attachmentName(media)))}</u>: ${sanitize(hidden ? spoiler(description) : description)}`,
	);
	const inner = wrapStyled(text, Math.max(1, width - 2)).map((line) => boxMiddle(line, width));
	return [boxTop(width), ...inner, boxBottom(width)];
}

/** 不带讨论串连线的帖子行，宽度为 columns - 3 * level */
function layoutPost(status: Status, options: PostBlockOptions): StyledLine[] {
	const post = status.reblog ?? status;
	const level = options.info?.level ?? 0;
	const width = options.columns - 3 * level;
	const inner = width - 2;
	const hidden = post.spoiler_text !== "" && !options.showSpoiler;

	const lines: StyledLine[] = [boxTop(width)];
	if (status.reblog) {
		lines.push(boxMiddle(boost(status.account.display_name || status.account.username, status.account.acct, inner), width));
	}
	lines.push(boxMiddle(account(post.account.display_name || post.account.username, post.account.acct, inner), width));

	if (post.spoiler_text) {
		const warning = pad(`CW: ${toDisplayable(post.spoiler_text)}`, inner);
		lines.push(boxMiddle(highlight(`<r>${sanitize(warning)}</r>`), width));
	}

	const body = htmlToStyled(post.content);
	const shown = hidden ? styledLine(spoiler(body.text), body.attrs) : body;
	for (const line of wrapStyled(shown, inner)) {
		lines.push(boxMiddle(line, width));
	}

	for (const media of post.media_attachments) {
		for (const line of layoutAttachment(media, inner, hidden)) {
			lines.push(boxMiddle(line, width));
		}
	}

	lines.push(replaceAt(boxBottom(width), statsLine(post, options.timeZone), -2));
	return lines;
}

/** 在 offset 处写入连线字符，offset 不在行内时忽略 */
function put(line: StyledLine, text: string, offset: number): StyledLine {
	if (offset < 0 || offset >= line.text.length) return line;
	return replaceAt(line, text, offset);
}

/** 加上层级缩进和讨论串连线 */
function decorate(lines: StyledLine[], info: ThreadInfo | undefined): StyledLine[] {
	if (!info) return lines;

	const level = info.level;
	const prefix = "   ".repeat(level);
	const link = 3 * level - 2;
	const last = lines.length - 1;

	return lines.map((content, index) => {
		let line = joinLines(prefix, content);

		for (const open of info.siblingLevels) {
			if (open >= 1) line = put(line, "│", 3 * open - 2);
		}

		if (index === 0) {
			if (info.highlighted) line = replaceAt(line, highlight("┤<b>current</b>├"), 7 + 3 * level);
			if (info.hasAncestors) line = put(line, "┴", 1 + 3 * level);
			if (info.hasParent) line = put(line, "│", link);
		} else if (index === 1 && info.hasParent) {
			line = put(line, info.hasSiblings ? "├─┤" : "└─┤", link);
		} else if (info.hasSiblings) {
			line = put(line, "│", link);
		}

		if (index === last && info.hasDescendants) {
			line = put(line, "┬", 1 + 3 * level);
		}
		return line;
	});
}
