import type { VacancyCriteria } from '../lib/config.js';
import type { VacancyRecord } from '../agents/types.js';

export type CriteriaResult = { ok: true } | { ok: false; reason: string };

/**
 * Local filter applied on top of the search query. The job board treats
 * `salary` as a hint, so the floor is enforced again here.
 */
export function matchesCriteria(vacancy: VacancyRecord, criteria: VacancyCriteria): CriteriaResult {
  if (criteria.minSalary !== undefined && vacancy.salary) {
    const ceiling = vacancy.salary.to ?? vacancy.salary.from;
    if (ceiling !== null && ceiling < criteria.minSalary) {
      return { ok: false, reason: `salary ${ceiling} below ${criteria.minSalary}` };
    }
  }

  const title = vacancy.title.toLowerCase();
  const excluded = criteria.excludeKeywords.find((keyword) => title.includes(keyword.toLowerCase()));
  if (excluded) {
    return { ok: false, reason: `title contains excluded keyword "${excluded}"` };
  }

  if (criteria.experience.length > 0 && vacancy.experience && !criteria.experience.includes(vacancy.experience)) {
    return { ok: false, reason: `experience ${vacancy.experience} not in ${criteria.experience.join(', ')}` };
  }

  return { ok: true };
}
