// Invoice arithmetic shared by the billing service and the invoice form preview.

export interface InvoiceTotals {
    subtotal: number;
    tax_amount: number;
    total: number;
}

export function round2(value: number) {
    return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function lineAmount(item: { quantity: number; unit_price: number }) {
    return round2(item.quantity * item.unit_price);
}

/** Tax is rounded per line before summing. */
export function computeTotals(items: ReadonlyArray<{ amount: number; tax_rate: number }>): InvoiceTotals {
    const subtotal = round2(items.reduce((sum, i) => sum + i.amount, 0));
    const taxAmount = round2(items.reduce((sum, i) => sum + round2(i.amount * i.tax_rate / 100), 0));
    return { subtotal, tax_amount: taxAmount, total: round2(subtotal + taxAmount) };
}
