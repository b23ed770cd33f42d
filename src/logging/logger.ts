import { getLogger } from '@logtape/logtape';
import type { Logger } from '@logtape/logtape';

export type { Logger } from '@logtape/logtape';

export const LOG_CATEGORY = 'unionfs';

export function getUnionLogger(...subcategory: string[]): Logger {
  return getLogger([LOG_CATEGORY, ...subcategory]);
}
