export {
    classifyStatement,
    leadingKeyword,
    lexicalStateAt,
    maskLiterals,
    parseUseStatement,
    splitStatements,
    statementAt,
    unquoteIdentifier,
} from './statements.js';

export type { LexicalState, Statement, StatementKind } from './statements.js';
