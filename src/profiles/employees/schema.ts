import { z } from 'zod';
import type { TableSchema } from '../../engine/types';
import { integerField, numericField, textField } from '../fields';

export const EMPLOYEE_SCHEMA: TableSchema = [
  { name: 'id', type: 'integer' },
  { name: 'name', type: 'string' },
  { name: 'age', type: 'integer' },
  { name: 'city', type: 'string' },
  { name: 'department', type: 'string' },
  { name: 'level', type: 'string' },
  { name: 'occupation', type: 'string' },
  { name: 'salary', type: 'numeric' },
];

export const EMPLOYEE_INDEX_COLUMNS: readonly string[] = ['department', 'level', 'salary'];

export const EmployeeRecordSchema = z.object({
  id: integerField,
  name: textField,
  age: integerField,
  city: textField,
  department: textField,
  level: textField,
  occupation: textField,
  salary: numericField,
});

export type EmployeeRecord = z.infer<typeof EmployeeRecordSchema>;
