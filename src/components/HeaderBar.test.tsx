import React from "react";
import { render } from "ink-testing-library";
import { describe, it, expect } from "vitest";
import { HeaderBar } from "./HeaderBar.js";
import { plain } from "../test/helpers.js";

describe("HeaderBar", () => {
	it("should show the running applications title in normal mode", () => {
		const { lastFrame } = render(<HeaderBar mode="normal" query="" />);

		expect(plain(lastFrame())).toContain("Running Applications");
		expect(plain(lastFrame())).not.toContain("Search Applications");
	});

	it("should show the query with a cursor in search mode", () => {
		const { lastFrame } = render(<HeaderBar mode="search" query="sla" />);

		expect(plain(lastFrame())).toContain("Search Applications: sla_");
	});

	it("should show only the cursor for an empty query", () => {
		const { lastFrame } = render(<HeaderBar mode="search" query="" />);

		expect(plain(lastFrame())).toContain("Search Applications: _");
	});
});
