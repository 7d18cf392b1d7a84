import { authRoute } from '../../../src/lib/api/handler';
import { created, ok, parseBody, queryParam } from '../../../src/lib/api/http';
import { paginate } from '../../../src/lib/pagination';
import { caseSchema } from '../../../src/lib/validation/cases';
import { createCase, listCases } from '../../../src/lib/services/cases';
import { serializeCase } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ req, db, user }) => {
        const cases = listCases(db, user, {
            status: queryParam(req, 'status'),
            client: queryParam(req, 'client'),
            search: queryParam(req, 'search'),
        });
        return ok(paginate(req, cases.map((c) => serializeCase(db, c))));
    },

    POST: async ({ req, db, user }) => {
        const input = parseBody(caseSchema, req.body);
        return created(serializeCase(db, await createCase(db, user, input)));
    },
});
