import { ObjectLiteral } from 'typeorm';
import { TaskPredicate } from './task-predicate';

export interface CompiledPredicate {
  where: string;
  parameters: ObjectLiteral;
}

const escapeLike = (text: string): string => text.replace(/[\\%_]/g, (ch) => `\\${ch}`);

/**
 * Renders a predicate as a `WHERE` fragment for a query builder whose root
 * entity is aliased as `alias`. Parameter names are unique within one call.
 */
export function compilePredicate(predicate: TaskPredicate, alias: string): CompiledPredicate {
  const parameters: ObjectLiteral = {};
  let counter = 0;

  const bind = (value: unknown): string => {
    const name = `${alias}_p${counter++}`;
    parameters[name] = value;
    return `:${name}`;
  };

  const visit = (node: TaskPredicate): string => {
    switch (node.kind) {
      case 'always':
        return '1=1';
      case 'equals':
        return `${alias}.${node.field} = ${bind(node.value)}`;
      case 'atLeast':
        return `${alias}.${node.field} >= ${bind(node.value)}`;
      case 'atMost':
        return `${alias}.${node.field} <= ${bind(node.value)}`;
      case 'contains': {
        const pattern = bind(`%${escapeLike(node.text)}%`);
        const matches = node.fields.map((field) => `LOWER(${alias}.${field}) LIKE ${pattern} ESCAPE '\\'`);
        return `(${matches.join(' OR ')})`;
      }
      case 'and':
        return `(${node.operands.map(visit).join(' AND ')})`;
    }
  };

  return { where: visit(predicate), parameters };
}
