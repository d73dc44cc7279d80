import { expect, test } from "vitest";
import { TransitionTable } from "../src/transition-table.ts";

test("edgesFrom() keeps link order", () => {
	const table = new TransitionTable();
	table.link(0, 5, () => true);
	table.link(1, 2, () => true);
	table.link(0, 3, () => true);
	table.link(0, 1, () => true);

	expect(table.edgesFrom(0)).toEqual([5, 3, 1]);
	expect(table.edgesFrom(1)).toEqual([2]);
	expect(table.edgesFrom(7)).toEqual([]);
	expect(table.size).toBe(4);
});

test("relinking replaces the guard and keeps the position", () => {
	const table = new TransitionTable();
	table.link(0, 1, () => true);
	table.link(0, 2, () => true);
	table.link(0, 1, () => false);

	expect(table.size).toBe(2);
	expect(table.edgesFrom(0)).toEqual([1, 2]);
	expect(table.guardOf(0, 1)?.()).toBe(false);
});

test("per-source lookup follows later links", () => {
	const table = new TransitionTable();
	table.link(0, 1, () => true);
	expect(table.edgesFrom(0)).toEqual([1]);

	table.link(0, 2, () => true);
	expect(table.edgesFrom(0)).toEqual([1, 2]);

	// returned arrays are copies
	table.edgesFrom(0).push(99);
	expect(table.edgesFrom(0)).toEqual([1, 2]);
});

test("has(), guardOf() and edges()", () => {
	const table = new TransitionTable();
	const guard = () => true;
	table.link(2, 3, guard);

	expect(table.has(2, 3)).toBe(true);
	expect(table.has(3, 2)).toBe(false);
	expect(table.guardOf(2, 3)).toBe(guard);
	expect(table.guardOf(3, 2)).toBeUndefined();
	expect(table.edges()).toEqual([{ from: 2, to: 3, guard }]);
});
