import { authRoute } from '../../../../src/lib/api/handler';
import { created, ok, parseBody, queryParam } from '../../../../src/lib/api/http';
import { paginate } from '../../../../src/lib/pagination';
import { invoiceSchema } from '../../../../src/lib/validation/invoices';
import { createInvoice, listInvoices } from '../../../../src/lib/services/invoices';
import { serializeInvoice } from '../../../../src/lib/serializers';

export default authRoute({
    GET: ({ req, db, user }) => {
        const invoices = listInvoices(db, user, {
            status: queryParam(req, 'status'),
            client: queryParam(req, 'client'),
            case: queryParam(req, 'case'),
        });
        return ok(paginate(req, invoices.map((i) => serializeInvoice(db, i))));
    },

    POST: async ({ req, db, user }) => {
        const input = parseBody(invoiceSchema, req.body);
        return created(serializeInvoice(db, await createInvoice(db, user, input)));
    },
});
