import { authRoute } from '../../../src/lib/api/handler';
import { profileHandlers } from '../../../src/lib/api/profile';

export default authRoute(profileHandlers);
