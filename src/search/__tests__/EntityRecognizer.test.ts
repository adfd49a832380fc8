import { describe, expect, it } from "vitest";
import { CapitalizedSpanRecognizer } from "@/search/EntityRecognizer";

describe("CapitalizedSpanRecognizer", () => {
    const recognizer = new CapitalizedSpanRecognizer();

    it("should classify people, organizations and places", () => {
        expect(recognizer.recognize("What did Alice Smith say about Acme Corp in Berlin?")).toEqual([
            { text: "Alice Smith", kind: "person" },
            { text: "Acme Corp", kind: "organization" },
            { text: "Berlin", kind: "place" },
        ]);
    });

    it("should not merge names separated by punctuation", () => {
        expect(recognizer.recognize("ping Alice, Bob and Carol")).toEqual([
            { text: "Alice", kind: "person" },
            { text: "Bob", kind: "person" },
            { text: "Carol", kind: "person" },
        ]);
    });

    it("should skip sentence starts, weekdays, time words and handles", () => {
        expect(recognizer.recognize("Deploy on Monday. Yesterday #General and @Dana agreed")).toEqual([]);
    });

    it("should report repeated spans once", () => {
        expect(recognizer.recognize("ask Priya and then ask Priya again")).toEqual([{ text: "Priya", kind: "person" }]);
    });
});
