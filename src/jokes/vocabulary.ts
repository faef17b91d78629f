import { z } from 'zod'
import { type Result, ok, err } from '../result.js'
import { type ValidationError, type ValidationField, validationError } from './errors.js'

// Tokens are case-sensitive. Categories are capitalized, the rest are not.
// See https://jokeapi.dev/#lang, #blacklist-flags, #categories and #joke-type

export const LanguageSchema = z.enum(['cs', 'de', 'en', 'es', 'fr', 'pt'])
export type Language = z.infer<typeof LanguageSchema>

export const FlagSchema = z.enum(['nsfw', 'religious', 'political', 'racist', 'sexist', 'explicit'])
export type Flag = z.infer<typeof FlagSchema>

export const CategorySchema = z.enum(['Any', 'Misc', 'Programming', 'Dark', 'Pun', 'Spooky', 'Christmas'])
export type Category = z.infer<typeof CategorySchema>

export const JokeTypeSchema = z.enum(['single', 'twopart'])
export type JokeType = z.infer<typeof JokeTypeSchema>

export const LANGUAGES = LanguageSchema.options
export const FLAGS = FlagSchema.options
export const CATEGORIES = CategorySchema.options
export const JOKE_TYPES = JokeTypeSchema.options

function parseToken<T extends string>(
	schema: z.ZodType<T>,
	field: ValidationField,
	raw: string,
): Result<T, ValidationError> {
	const result = schema.safeParse(raw)
	return result.success ? ok(result.data) : err(validationError(field, raw))
}

export function parseLanguage(raw: string): Result<Language, ValidationError> {
	return parseToken(LanguageSchema, 'lang code', raw)
}

export function parseFlag(raw: string): Result<Flag, ValidationError> {
	return parseToken(FlagSchema, 'flag', raw)
}

export function parseCategory(raw: string): Result<Category, ValidationError> {
	return parseToken(CategorySchema, 'category', raw)
}

export function parseJokeType(raw: string): Result<JokeType, ValidationError> {
	return parseToken(JokeTypeSchema, 'type', raw)
}
