import { type Static, Type } from '@sinclair/typebox';
import type { RangeReplacement } from '#shared/patch/patch.model';
import type { AreTypesFullyCompatible } from '#shared/utils/type-compatibility';

export const ReplaceInFileInputSchema = Type.Object({
	path: Type.String({ minLength: 1 }),
	diff: Type.String(),
});
export type ReplaceInFileInput = Static<typeof ReplaceInFileInputSchema>;

export const StrReplaceInputSchema = Type.Object({
	path: Type.String({ minLength: 1 }),
	oldStr: Type.String(),
	newStr: Type.String(),
	replaceAll: Type.Optional(Type.Boolean()),
});
export type StrReplaceInput = Static<typeof StrReplaceInputSchema>;

export const InsertInputSchema = Type.Object({
	path: Type.String({ minLength: 1 }),
	insertLine: Type.Integer({ minimum: 0 }),
	newStr: Type.String(),
});
export type InsertInput = Static<typeof InsertInputSchema>;

export const CreateInputSchema = Type.Object({
	path: Type.String({ minLength: 1 }),
	fileText: Type.String(),
});
export type CreateInput = Static<typeof CreateInputSchema>;

export const RangeReplacementSchema = Type.Object({
	path: Type.String(),
	startLine: Type.Integer({ minimum: 1 }),
	endLine: Type.Integer({ minimum: 0 }),
	lines: Type.Array(Type.String()),
});
const _rangeReplacementCheck: AreTypesFullyCompatible<RangeReplacement, Static<typeof RangeReplacementSchema>> = true;
