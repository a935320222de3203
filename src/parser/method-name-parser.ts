import { InvalidMethodNameError } from '../errors.js';
import type {
  OrGroup,
  ParsedMethodName,
  PredicateOperator,
  PredicatePart,
  SortOrder,
  SubjectKind,
} from './types.js';

interface OperatorKeywords {
  readonly operator: PredicateOperator;
  readonly keywords: readonly string[];
  readonly argumentCount: number;
}

const OPERATORS: readonly OperatorKeywords[] = [
  { operator: 'IS_NOT_NULL', keywords: ['IsNotNull', 'NotNull'], argumentCount: 0 },
  { operator: 'IS_NULL', keywords: ['IsNull', 'Null'], argumentCount: 0 },
  { operator: 'BETWEEN', keywords: ['IsBetween', 'Between'], argumentCount: 2 },
  { operator: 'LESS_THAN', keywords: ['IsLessThan', 'LessThan'], argumentCount: 1 },
  { operator: 'LESS_THAN_OR_EQUAL', keywords: ['IsLessThanEqual', 'LessThanEqual'], argumentCount: 1 },
  { operator: 'GREATER_THAN', keywords: ['IsGreaterThan', 'GreaterThan'], argumentCount: 1 },
  { operator: 'GREATER_THAN_OR_EQUAL', keywords: ['IsGreaterThanEqual', 'GreaterThanEqual'], argumentCount: 1 },
  { operator: 'BEFORE', keywords: ['IsBefore', 'Before'], argumentCount: 1 },
  { operator: 'AFTER', keywords: ['IsAfter', 'After'], argumentCount: 1 },
  { operator: 'NOT_LIKE', keywords: ['IsNotLike', 'NotLike'], argumentCount: 1 },
  { operator: 'LIKE', keywords: ['IsLike', 'Like'], argumentCount: 1 },
  { operator: 'STARTING_WITH', keywords: ['IsStartingWith', 'StartingWith', 'StartsWith'], argumentCount: 1 },
  { operator: 'ENDING_WITH', keywords: ['IsEndingWith', 'EndingWith', 'EndsWith'], argumentCount: 1 },
  { operator: 'IS_NOT_EMPTY', keywords: ['IsNotEmpty', 'NotEmpty'], argumentCount: 0 },
  { operator: 'IS_EMPTY', keywords: ['IsEmpty', 'Empty'], argumentCount: 0 },
  { operator: 'NOT_CONTAINING', keywords: ['IsNotContaining', 'NotContaining', 'NotContains'], argumentCount: 1 },
  { operator: 'CONTAINING', keywords: ['IsContaining', 'Containing', 'Contains'], argumentCount: 1 },
  { operator: 'NOT_IN', keywords: ['IsNotIn', 'NotIn'], argumentCount: 1 },
  { operator: 'IN', keywords: ['IsIn', 'In'], argumentCount: 1 },
  { operator: 'NEAR', keywords: ['IsNear', 'Near'], argumentCount: 1 },
  { operator: 'WITHIN', keywords: ['IsWithin', 'Within'], argumentCount: 1 },
  { operator: 'REGEX', keywords: ['MatchesRegex', 'Matches', 'Regex'], argumentCount: 1 },
  { operator: 'EXISTS', keywords: ['Exists'], argumentCount: 0 },
  { operator: 'TRUE', keywords: ['IsTrue', 'True'], argumentCount: 0 },
  { operator: 'FALSE', keywords: ['IsFalse', 'False'], argumentCount: 0 },
  { operator: 'NOT_EQUALS', keywords: ['IsNot', 'Not'], argumentCount: 1 },
  { operator: 'EQUALS', keywords: ['Is', 'Equals'], argumentCount: 1 },
];

const PREFIX_PATTERN = /^(find|read|get|query|search|stream|count|exists|delete|remove)(\p{Lu}.*?)??By/u;
const LIMIT_PATTERN = /(First|Top)(\d*)/;
const SORT_KEY_PATTERN = /^(.+?)(Asc|Desc)?$/;

const SUBJECTS: Record<string, SubjectKind> = {
  count: 'count',
  exists: 'exists',
  delete: 'delete',
  remove: 'delete',
};

/** Splits on a keyword only where the next character starts a new word. */
function splitOnKeyword(source: string, keyword: string): string[] {
  return source.split(new RegExp(`${keyword}(?=\\p{Lu}|$)`, 'u'));
}

function uncapitalize(value: string): string {
  return value.charAt(0).toLowerCase() + value.slice(1);
}

function parsePart(source: string, methodName: string): PredicatePart {
  let match: { operator: PredicateOperator; keyword: string; argumentCount: number } | null = null;
  for (const { operator, keywords, argumentCount } of OPERATORS) {
    for (const keyword of keywords) {
      const longer = match === null || keyword.length > match.keyword.length;
      if (longer && source.endsWith(keyword)) {
        match = { operator, keyword, argumentCount };
      }
    }
  }

  const property = match === null ? source : source.slice(0, source.length - match.keyword.length);
  if (property === '') {
    throw new InvalidMethodNameError(methodName, `clause "${source}" does not name a property`);
  }
  return {
    property: uncapitalize(property),
    operator: match?.operator ?? 'EQUALS',
    argumentCount: match?.argumentCount ?? 1,
  };
}

function parseSort(source: string, methodName: string): SortOrder[] {
  return source.split(/(?<=Asc|Desc)(?=\p{Lu})/u).map((key): SortOrder => {
    const matched = SORT_KEY_PATTERN.exec(key);
    const property = matched?.[1];
    if (property === undefined) {
      throw new InvalidMethodNameError(methodName, `invalid order clause "${key}"`);
    }
    return {
      property: uncapitalize(property),
      direction: matched?.[2] === 'Desc' ? 'DESC' : 'ASC',
    };
  });
}

function parsePredicate(source: string, methodName: string): OrGroup[] {
  if (source === '') {
    return [];
  }
  return splitOnKeyword(source, 'Or').map((group) => {
    if (group === '') {
      throw new InvalidMethodNameError(methodName, 'empty Or group');
    }
    return splitOnKeyword(group, 'And').map((part) => {
      if (part === '') {
        throw new InvalidMethodNameError(methodName, 'empty And clause');
      }
      return parsePart(part, methodName);
    });
  });
}

/**
 * Decomposes a repository method name into its subject flags, AND/OR
 * predicate groups and sort specification.
 *
 * @example
 * parseMethodName('findTop3ByCityOrderByAgeDesc')
 * // → subject 'find', maxResults 3, one group [city EQUALS], sort [age DESC]
 */
export function parseMethodName(methodName: string): ParsedMethodName {
  const prefix = PREFIX_PATTERN.exec(methodName);
  const verb = prefix?.[1] ?? 'find';
  const subjectText = prefix?.[2] ?? '';
  const predicateText = prefix === null ? methodName : methodName.slice(prefix[0].length);

  const sections = splitOnKeyword(predicateText, 'OrderBy');
  if (sections.length > 2) {
    throw new InvalidMethodNameError(methodName, 'OrderBy must not be used more than once');
  }
  const [predicate = '', orderBy] = sections;
  if (orderBy === '') {
    throw new InvalidMethodNameError(methodName, 'OrderBy is not followed by a property');
  }

  const limit = LIMIT_PATTERN.exec(subjectText);
  let maxResults: number | null = null;
  if (limit !== null) {
    maxResults = limit[2] ? Number.parseInt(limit[2], 10) : 1;
  }

  return {
    methodName,
    subject: SUBJECTS[verb] ?? 'find',
    distinct: subjectText.includes('Distinct'),
    maxResults,
    orGroups: parsePredicate(predicate, methodName),
    sort: orderBy === undefined ? [] : parseSort(orderBy, methodName),
  };
}
