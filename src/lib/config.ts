import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";

export const configSchema = z.object({
	applicationsDir: z.string().min(1).default("/Applications"),
	scanDepth: z.number().int().positive().default(2),
	tui: z
		.object({
			tickMs: z.number().int().positive().default(100),
			statusTicks: z.number().int().positive().default(30),
			alternateScreen: z.boolean().default(true),
		})
		.default({}),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
	return configSchema.parse(raw ?? {});
}

export async function loadConfig(searchFrom?: string): Promise<Config> {
	const explorer = cosmiconfig("appdeck");
	const result = await explorer.search(searchFrom);

	return parseConfig(result?.config);
}
