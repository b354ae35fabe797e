/**
 * @file 上游响应的数据结构
 *
 * 只声明本程序用到的字段；服务器返回的其他字段会被忽略。
 * 每个结构都编译出一个校验器，客户端在使用响应之前先校验。
 */

import { type Static, Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";

const NullableString = Type.Union([Type.String(), Type.Null()]);

export const AccountSchema = Type.Object({
	id: Type.String(),
	username: Type.String(),
	acct: Type.String(),
	display_name: Type.String(),
	url: Type.Optional(Type.String()),
});

export const MediaAttachmentSchema = Type.Object({
	id: Type.String(),
	type: Type.String(),
	url: NullableString,
	description: Type.Optional(NullableString),
});

/** 不含转发字段的帖子 */
export const StatusCoreSchema = Type.Object({
	id: Type.String(),
	in_reply_to_id: Type.Optional(NullableString),
	uri: Type.String(),
	url: Type.Optional(NullableString),
	created_at: Type.String(),
	account: AccountSchema,
	content: Type.String(),
	spoiler_text: Type.String(),
	visibility: Type.Optional(Type.String()),
	media_attachments: Type.Array(MediaAttachmentSchema),
	replies_count: Type.Number(),
	reblogs_count: Type.Number(),
	favourites_count: Type.Number(),
	favourited: Type.Optional(Type.Boolean()),
	reblogged: Type.Optional(Type.Boolean()),
	bookmarked: Type.Optional(Type.Boolean()),
	muted: Type.Optional(Type.Boolean()),
});

/** 帖子；转发时 reblog 为被转发的原帖 */
export const StatusSchema = Type.Intersect([
	StatusCoreSchema,
	Type.Object({
		reblog: Type.Optional(Type.Union([StatusCoreSchema, Type.Null()])),
	}),
]);

export const StatusListSchema = Type.Array(StatusSchema);

export const ContextSchema = Type.Object({
	ancestors: Type.Array(StatusSchema),
	descendants: Type.Array(StatusSchema),
});

export const PreferencesSchema = Type.Object({
	"posting:default:visibility": Type.Optional(Type.String()),
	"posting:default:sensitive": Type.Optional(Type.Boolean()),
	"posting:default:language": Type.Optional(NullableString),
	"reading:expand:media": Type.Optional(Type.String()),
	"reading:expand:spoilers": Type.Optional(Type.Boolean()),
});

export const TokenSchema = Type.Object({
	access_token: Type.String(),
	token_type: Type.Optional(Type.String()),
	scope: Type.Optional(Type.String()),
});

export const AppCredentialsSchema = Type.Object({
	client_id: Type.String(),
	client_secret: Type.String(),
});

export type Account = Static<typeof AccountSchema>;
export type MediaAttachment = Static<typeof MediaAttachmentSchema>;
export type StatusCore = Static<typeof StatusCoreSchema>;
export type Status = Static<typeof StatusSchema>;
export type Context = Static<typeof ContextSchema>;
export type Preferences = Static<typeof PreferencesSchema>;
export type Token = Static<typeof TokenSchema>;
export type AppCredentials = Static<typeof AppCredentialsSchema>;

export const validators = {
	account: TypeCompiler.Compile(AccountSchema),
	status: TypeCompiler.Compile(StatusSchema),
	statusList: TypeCompiler.Compile(StatusListSchema),
	context: TypeCompiler.Compile(ContextSchema),
	preferences: TypeCompiler.Compile(PreferencesSchema),
	token: TypeCompiler.Compile(TokenSchema),
	appCredentials: TypeCompiler.Compile(AppCredentialsSchema),
};
