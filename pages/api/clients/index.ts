import { authRoute } from '../../../src/lib/api/handler';
import { created, ok, parseBody, parseBooleanParam, queryParam } from '../../../src/lib/api/http';
import { paginate } from '../../../src/lib/pagination';
import { clientSchema } from '../../../src/lib/validation/clients';
import { createClient, listClients } from '../../../src/lib/services/clients';
import { serializeClient } from '../../../src/lib/serializers';

export default authRoute({
    GET: ({ req, db, user }) => {
        const clients = listClients(db, user, {
            search: queryParam(req, 'search'),
            is_active: parseBooleanParam(req, 'is_active'),
            city: queryParam(req, 'city'),
        });
        return ok(paginate(req, clients.map(serializeClient)));
    },

    POST: async ({ req, db, user }) => {
        const input = parseBody(clientSchema, req.body);
        return created(serializeClient(await createClient(db, user, input)));
    },
});
