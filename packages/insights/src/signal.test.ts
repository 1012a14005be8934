import { describe, expect, it } from "vitest";
import { classifySignal } from "./signal";

describe("classifySignal", () => {
	it("requires both a strong forecast and matching momentum", () => {
		expect(classifySignal(0.06, 0.01)).toBe("bullish");
		expect(classifySignal(0.06, -0.01)).toBe("watch");
		expect(classifySignal(-0.06, -0.01)).toBe("bearish");
		expect(classifySignal(-0.06, 0.01)).toBe("watch");
	});

	it("treats the thresholds as exclusive", () => {
		expect(classifySignal(0.05, 0.01)).toBe("watch");
		expect(classifySignal(-0.05, -0.01)).toBe("watch");
		expect(classifySignal(0.06, 0)).toBe("watch");
		expect(classifySignal(-0.06, 0)).toBe("watch");
	});
});
