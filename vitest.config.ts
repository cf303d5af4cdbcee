import * as os from "node:os";
import * as path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/test/**/*.test.ts"],
		testTimeout: 20_000,
		env: {
			// Keeps log files and default paths out of the real home directory.
			FINCH_CONFIG_DIR: path.join(os.tmpdir(), "finch-vitest"),
		},
	},
});
