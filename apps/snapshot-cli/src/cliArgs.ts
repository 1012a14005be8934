export type ArgValue = string | boolean;

export interface ParsedCliArgs {
	flags: Record<string, ArgValue>;
	positionals: string[];
}

const DEFAULT_BOOLEAN_FLAGS = ["help", "json"];

/**
 * `--key value`, `--key=value` and bare `--flag` tokens; anything else is
 * positional. Flags listed in `booleanFlags` never consume the next token.
 */
export const parseCliArgs = (
	argv: string[],
	booleanFlags: readonly string[] = DEFAULT_BOOLEAN_FLAGS
): ParsedCliArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			flags[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (!booleanFlags.includes(key) && next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { flags, positionals };
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getListArg = (
	args: Record<string, ArgValue>,
	key: string
): string[] | undefined => {
	const raw = getStringArg(args, key);
	if (!raw) {
		return undefined;
	}
	const entries = raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return entries.length ? entries : undefined;
};

export const getBooleanArg = (
	args: Record<string, ArgValue>,
	key: string
): boolean => args[key] === true || args[key] === "true";
