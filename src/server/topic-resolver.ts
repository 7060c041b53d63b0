import type { TopicResolver } from "../interfaces/policy.js";

const PLACEHOLDER_RE = /\{(username|clientId|topic)\}/g;

export const DEFAULT_TOPIC_TEMPLATE = "{username}/{topic}";

/**
 * Namespaces client topics by expanding a template.
 *
 * Placeholders: `{username}`, `{clientId}`, `{topic}`. The default template
 * `"{username}/{topic}"` gives each user a private topic space.
 */
export class TemplateTopicResolver implements TopicResolver {
  constructor(private readonly template: string = DEFAULT_TOPIC_TEMPLATE) {
    if (!template.includes("{topic}")) {
      throw new Error(`Topic template must contain {topic}: ${template}`);
    }
  }

  resolveTopic(username: string, clientId: string, requestedTopic: string): string {
    const values = { username, clientId, topic: requestedTopic };
    return this.template.replace(
      PLACEHOLDER_RE,
      (_match, name: keyof typeof values) => values[name],
    );
  }
}
