import type { Row, TableProfile } from '../engine/types';
import employeesProfile from './employees';

/**
 * Register all table profiles here.
 * To add a new table, create a profile under src/profiles/<name>/
 * and add it to this map.
 */
const profiles: Record<string, TableProfile<Row>> = {
  employees: employeesProfile,
};

export const getProfile = (name: string): TableProfile<Row> => {
  const profile = profiles[name];
  if (!profile) {
    const available = Object.keys(profiles).join(', ');
    throw new Error(`Unknown profile "${name}". Available profiles: ${available}`);
  }
  return profile;
};

export const listProfiles = (): string[] => Object.keys(profiles);
