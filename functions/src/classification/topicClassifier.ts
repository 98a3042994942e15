import topicTable from './topicKeywords.json';

export const GENERAL_TOPIC = 'General';

export interface TopicRule {
  topic: string;
  keywords: string[];
}

interface CompiledRule {
  topic: string;
  patterns: RegExp[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Keywords match whole words or phrases so that "ai" does not fire on "said".
function compileKeyword(keyword: string): RegExp {
  const body = escapeRegExp(keyword.trim().toLowerCase()).replace(/\s+/g, '\\s+');
  return new RegExp(`(^|[^a-z0-9])${body}($|[^a-z0-9])`, 'i');
}

export function compileRules(rules: TopicRule[]): CompiledRule[] {
  return rules.map(rule => ({
    topic: rule.topic,
    patterns: rule.keywords.filter(keyword => keyword.trim().length > 0).map(compileKeyword),
  }));
}

const DEFAULT_RULES = compileRules(topicTable);

/**
 * Rule order decides ties: the first topic with any matching keyword wins.
 */
export function classifyTopic(title: string, rules: CompiledRule[] = DEFAULT_RULES): string {
  for (const rule of rules) {
    if (rule.patterns.some(pattern => pattern.test(title))) {
      return rule.topic;
    }
  }
  return GENERAL_TOPIC;
}
