import { describe, expect, it } from "vitest";
import { ApiError, NetworkError } from "@/lib/api-client/errors";
import {
    appointmentStatusView, caseStatusView, describeError, describeFieldErrors, filterByText,
    formatCurrency, formatDate, formatDateTime, formatTimeRange, fromDateTimeInput, toDateTimeInput, invoiceStatusView, isInvoiceOverdue,
    patchById, relativeDayLabel, removeById, replaceById, upsertById,
} from "@/lib/view-models";

describe("formatting", () => {
    it("formats money as US dollars", () => {
        expect(formatCurrency(1234.5)).toBe("$1,234.50");
        expect(formatCurrency(0)).toBe("$0.00");
        expect(formatCurrency(null)).toBe("-");
    });

    it("formats dates and date-times", () => {
        expect(formatDate("2030-01-16")).toBe("Jan 16, 2030");
        expect(formatDate(null)).toBe("-");
        expect(formatDate("soon")).toBe("soon");
        expect(formatDateTime(new Date(2030, 0, 16, 14, 5))).toBe("Jan 16, 2030 2:05 PM");
    });

    it("shows the date once for a same-day range", () => {
        expect(formatTimeRange(new Date(2030, 0, 16, 10), new Date(2030, 0, 16, 11))).toBe(
            "Jan 16, 2030 10:00 AM - 11:00 AM",
        );
        expect(formatTimeRange(new Date(2030, 0, 16, 22), new Date(2030, 0, 17, 1))).toBe(
            "Jan 16, 2030 10:00 PM - Jan 17, 2030 1:00 AM",
        );
    });

    it("converts between ISO timestamps and datetime-local inputs", () => {
        const local = new Date(2030, 0, 16, 10, 30);

        expect(toDateTimeInput(local.toISOString())).toBe("2030-01-16T10:30");
        expect(fromDateTimeInput("2030-01-16T10:30")).toBe(local.toISOString());
        expect(fromDateTimeInput("")).toBe("");
        expect(toDateTimeInput(null)).toBe("");
    });

    it("labels days relative to now", () => {
        const now = new Date(2030, 0, 16, 9);

        expect(relativeDayLabel(new Date(2030, 0, 16, 23), now)).toBe("Today");
        expect(relativeDayLabel(new Date(2030, 0, 17, 8), now)).toBe("Tomorrow");
        expect(relativeDayLabel(new Date(2030, 0, 15, 8), now)).toBe("Yesterday");
        expect(relativeDayLabel(new Date(2030, 0, 20, 8), now)).toBe("Sunday");
        expect(relativeDayLabel(new Date(2030, 0, 23, 8), now)).toBe("Jan 23, 2030");
        expect(relativeDayLabel("not a date", now)).toBe("not a date");
    });
});

describe("status views", () => {
    it("maps statuses to a label and a tone", () => {
        expect(caseStatusView("in_progress")).toEqual({
            label: "In Progress",
            tone: "amber",
            className: "bg-amber-100 text-amber-800 border-amber-200",
        });
        expect(appointmentStatusView("cancelled").tone).toBe("red");
        expect(invoiceStatusView("paid")).toMatchObject({ label: "Paid", tone: "green" });
    });

    it("treats sent invoices past due as overdue", () => {
        expect(isInvoiceOverdue({ status: "sent", due_date: "2030-01-10" }, "2030-01-16")).toBe(true);
        expect(isInvoiceOverdue({ status: "sent", due_date: "2030-01-16" }, "2030-01-16")).toBe(false);
        expect(isInvoiceOverdue({ status: "paid", due_date: "2030-01-10" }, "2030-01-16")).toBe(false);
        expect(isInvoiceOverdue({ status: "overdue", due_date: "2030-02-10" }, "2030-01-16")).toBe(true);
    });
});

describe("list updates", () => {
    const rows = [
        { id: "a", name: "Ann" },
        { id: "b", name: "Bob" },
    ];

    it("inserts new rows at the requested end", () => {
        expect(upsertById(rows, { id: "c", name: "Cy" }).map((r) => r.id)).toEqual(["c", "a", "b"]);
        expect(upsertById(rows, { id: "c", name: "Cy" }, "end").map((r) => r.id)).toEqual(["a", "b", "c"]);
    });

    it("replaces existing rows in place", () => {
        expect(upsertById(rows, { id: "b", name: "Bobby" })).toEqual([
            { id: "a", name: "Ann" },
            { id: "b", name: "Bobby" },
        ]);
        expect(replaceById(rows, { id: "z", name: "Zed" })).toEqual(rows);
    });

    it("patches and removes by id without touching the input", () => {
        expect(patchById(rows, "a", { name: "Annie" })[0]).toEqual({ id: "a", name: "Annie" });
        expect(removeById(rows, "a")).toEqual([{ id: "b", name: "Bob" }]);
        expect(rows).toHaveLength(2);
        expect(rows[0].name).toBe("Ann");
    });

    it("filters by every term across the picked fields", () => {
        const clients = [
            { id: "1", name: "Ann Lee", email: "ann@example.com", city: "Boston" },
            { id: "2", name: "Bob Stone", email: null, city: "Denver" },
            { id: "3", name: "Ann Moss", email: "moss@example.com", city: "Denver" },
        ];
        const pick = (c: (typeof clients)[number]) => [c.name, c.email, c.city];

        expect(filterByText(clients, "ann", pick).map((c) => c.id)).toEqual(["1", "3"]);
        expect(filterByText(clients, "  ANN  denver ", pick).map((c) => c.id)).toEqual(["3"]);
        expect(filterByText(clients, "", pick)).toHaveLength(3);
    });
});

describe("describeError", () => {
    it("flattens field maps", () => {
        const error = new ApiError(400, "first_name: This field may not be blank.", {
            first_name: ["This field may not be blank."],
            non_field_errors: ["Check the form."],
        });

        expect(describeError(error)).toBe("First name: This field may not be blank. Check the form.");
        expect(describeFieldErrors({ "items.0.quantity": ["Ensure this value is greater than or equal to 0.01."] })).toEqual([
            "Items 0 quantity: Ensure this value is greater than or equal to 0.01.",
        ]);
    });

    it("uses the server's detail otherwise", () => {
        expect(describeError(new ApiError(401, "Token is blacklisted", { detail: "Token is blacklisted" }))).toBe(
            "Token is blacklisted",
        );
        expect(describeError(new ApiError(400, "Both start and end date parameters are required"))).toBe(
            "Both start and end date parameters are required",
        );
    });

    it("has fixed messages for missing records and server failures", () => {
        expect(describeError(new ApiError(404, "Not found."))).toBe("That record no longer exists.");
        expect(describeError(new ApiError(500, "Internal server error."))).toBe("The server hit an error. Please try again.");
    });

    it("passes network and plain errors through", () => {
        expect(describeError(new NetworkError("Unable to reach the server. Check your connection."))).toBe(
            "Unable to reach the server. Check your connection.",
        );
        expect(describeError(new Error("boom"))).toBe("boom");
        expect(describeError("boom")).toBe("Something went wrong. Please try again.");
    });
});
