import { describe, expect, it, beforeEach } from "vitest";
import { setServerConfig } from "@/lib/config";
import { NotFoundError } from "@/lib/errors";
import { paginate } from "@/lib/pagination";
import { createRequest } from "../helpers/http";

const ITEMS = [1, 2, 3, 4, 5];

function pageOf(query: Record<string, string>, url = "/api/items/") {
    return paginate(createRequest({ url, query }), ITEMS);
}

describe("paginate", () => {
    beforeEach(() => {
        setServerConfig({ pageSize: 2, maxPageSize: 3 });
    });

    it("returns the first page with a link to the next", () => {
        expect(pageOf({})).toEqual({ count: 5, next: "/api/items/?page=2", previous: null, results: [1, 2] });
    });

    it("links back to the first page without a page parameter", () => {
        const page = pageOf({ page: "2" }, "/api/items/?page=2&search=x");

        expect(page.results).toEqual([3, 4]);
        expect(page.next).toBe("/api/items/?page=3&search=x");
        expect(page.previous).toBe("/api/items/?search=x");
    });

    it("understands page=last", () => {
        expect(pageOf({ page: "last" })).toMatchObject({ results: [5], next: null, previous: "/api/items/?page=2" });
    });

    it("caps page_size", () => {
        expect(pageOf({ page_size: "10" }).results).toEqual([1, 2, 3]);
    });

    it("falls back to the default size for junk", () => {
        expect(pageOf({ page_size: "-4" }).results).toEqual([1, 2]);
    });

    it.each(["4", "0", "abc"])("rejects page %s", (page) => {
        expect(() => pageOf({ page })).toThrow(NotFoundError);
        expect(() => pageOf({ page })).toThrow("Invalid page.");
    });

    it("serves an empty first page", () => {
        expect(paginate(createRequest({ url: "/api/items/" }), [])).toEqual({ count: 0, next: null, previous: null, results: [] });
    });
});
