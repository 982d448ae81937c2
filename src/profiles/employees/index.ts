import type { TableProfile } from '../../engine/types';
import { parseEmployee } from './parse';
import { EMPLOYEE_SCHEMA, EMPLOYEE_INDEX_COLUMNS, type EmployeeRecord } from './schema';

export type { EmployeeRecord } from './schema';

const employeesProfile: TableProfile<EmployeeRecord> = {
  name: 'employees',

  schema: EMPLOYEE_SCHEMA,

  parseRecord: parseEmployee,

  indexColumns: EMPLOYEE_INDEX_COLUMNS,
};

export default employeesProfile;
