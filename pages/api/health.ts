import { publicRoute } from '../../src/lib/api/handler';
import { ok } from '../../src/lib/api/http';
import type { HealthDto } from '../../src/lib/api-types';

export default publicRoute({
    GET: () => ok({
        status: 'healthy',
        service: 'lawyer-office-management-api',
        version: '1.0.0',
    } satisfies HealthDto),
});
