/**
 * Data File Loader
 *
 * Reads the JSON lookup tables shipped in the repository's data/ directory
 * and validates them against a zod schema. Paths resolve relative to this
 * module, which sits two levels below the package root in both src/ and dist/.
 */

import { readFileSync } from 'fs';
import type { z } from 'zod';
import { Result, ok, err, trySync, describeError } from './result-types.js';
import { ConfigError } from './errors.js';

export function dataFileUrl(name: string): URL {
	return new URL(`../../data/${name}`, import.meta.url);
}

export function loadDataFile<T extends z.ZodTypeAny>(
	name: string,
	schema: T
): Result<z.infer<T>, ConfigError> {
	const raw = trySync(
		(): unknown => JSON.parse(readFileSync(dataFileUrl(name), 'utf-8')),
		(error) => new ConfigError(`Cannot read data file ${name}: ${describeError(error)}`)
	);
	if (raw.isErr()) {
		return err(raw.error);
	}

	const parsed = schema.safeParse(raw.value);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ');
		return err(new ConfigError(`Invalid data file ${name}: ${details}`));
	}
	return ok(parsed.data);
}

/**
 * Compile a regular expression read from a data file
 *
 * @param origin - Where the pattern came from, for the error message
 */
export function compilePattern(source: string, flags: string, origin: string): Result<RegExp, ConfigError> {
	return trySync(
		() => new RegExp(source, flags),
		(error) => new ConfigError(`Invalid pattern in ${origin}: ${describeError(error)}`)
	);
}
