import { z } from 'zod';
import { ACTIVITY_TYPES } from '../types';
import { choiceErrors, optionalText, requiredText } from './fields';

export const activitySchema = z.object({
    action_type: z.enum(ACTIVITY_TYPES, choiceErrors),
    description: requiredText(),
    related_object_id: optionalText(64),
});
