import { describe, it, expect } from "vitest";
import { DocumentContext, DocumentContextRegistry } from "./document-context.js";

describe("DocumentContext", () => {
	it("caches results and counts duplicates", () => {
		const context = new DocumentContext("doc-1");
		context.addInput("Hello");
		context.addInput("Hello");
		context.setResult("Hello", "Hallo");
		context.setResult("Hello", "Hallo");
		expect(context.getResult("Hello")).toBe("Hallo");
		expect(context.getResult("Bye")).toBeUndefined();
		expect(context.batchInput).toEqual(["Hello", "Hello"]);
		expect(context.stats()).toEqual({
			documentId: "doc-1",
			inputSentences: 2,
			resultTranslations: 1,
			duplicates: 1,
		});
	});
});

describe("DocumentContextRegistry", () => {
	it("keeps one context per document", () => {
		const registry = new DocumentContextRegistry();
		const first = registry.open("a");
		expect(registry.open("a")).toBe(first);
		expect(registry.open("b")).not.toBe(first);
		expect(registry.get("a")).toBe(first);
	});

	it("forgets closed documents", () => {
		const registry = new DocumentContextRegistry();
		registry.open("a").setResult("x", "y");
		expect(registry.stats("a")?.resultTranslations).toBe(1);
		expect(registry.close("a")).toBe(true);
		expect(registry.close("a")).toBe(false);
		expect(registry.get("a")).toBeUndefined();
		expect(registry.stats("a")).toBeUndefined();
	});
});
