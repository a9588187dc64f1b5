import { ManualClock, systemClock } from "./clock.js";

describe("clocks", () => {
	it("should read the system clock in whole seconds", () => {
		const now = systemClock.now();

		expect(Number.isInteger(now)).toBe(true);
		expect(Math.abs(now - Date.now() / 1000)).toBeLessThan(2);
	});

	it("should only move a manual clock forward", () => {
		const clock = new ManualClock(100);

		clock.advance(5);
		expect(clock.now()).toBe(105);
		clock.set(105);
		expect(clock.now()).toBe(105);
		expect(() => clock.set(104)).toThrow(
			"Clock cannot move backwards (104 < 105)",
		);
	});
});
