/** A value an expression can produce. */
export type CesqlValue = string | number | boolean;

export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '<=' | '>' | '>=';
export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type LogicalOperator = 'AND' | 'OR' | 'XOR';

export type Expression =
  | { readonly type: 'Literal'; readonly value: CesqlValue }
  | { readonly type: 'Attribute'; readonly name: string }
  | { readonly type: 'Not'; readonly operand: Expression }
  | { readonly type: 'Negate'; readonly operand: Expression }
  | { readonly type: 'Logical'; readonly operator: LogicalOperator; readonly left: Expression; readonly right: Expression }
  | { readonly type: 'Comparison'; readonly operator: ComparisonOperator; readonly left: Expression; readonly right: Expression }
  | { readonly type: 'Arithmetic'; readonly operator: ArithmeticOperator; readonly left: Expression; readonly right: Expression }
  | { readonly type: 'Like'; readonly negated: boolean; readonly operand: Expression; readonly pattern: string }
  | { readonly type: 'In'; readonly negated: boolean; readonly operand: Expression; readonly items: readonly Expression[] }
  | { readonly type: 'Exists'; readonly name: string }
  | { readonly type: 'Call'; readonly name: string; readonly args: readonly Expression[] };
