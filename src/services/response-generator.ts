import type { ComposeRequest, ComposedResponse, EmotionProfile, MatchedProperty, ResponseComposer } from '../types';
import { formatMoney, formatRate, formatSqFt } from '../utils/format';

export const TEMPLATE_MODEL = 'template';

const GREETING = /\b(hello|hi|hey)\b/;

export const FOLLOW_UP_QUESTIONS = `I'd love to help you find the perfect office space! To give you the best recommendations, could you tell me:
• How many people will work in the space?
• What's your budget per square foot?
• Any preferred location (downtown, midtown, etc.)?
• What type of business are you in?

The more details you provide, the better I can match you with ideal properties!`;

export const GREETING_RESPONSE =
  "Hello! I'm excited to help you find the perfect commercial space for your business. Tell me about your company and what you're looking for!";

/**
 * Templated replies used when no language model is configured, or when the model call fails.
 */
export class ResponseGenerator implements ResponseComposer {
  readonly name = TEMPLATE_MODEL;

  async compose(request: ComposeRequest): Promise<ComposedResponse> {
    return {
      text: this.render(request),
      tokensUsed: 0,
      model: TEMPLATE_MODEL
    };
  }

  render({ message, matches, emotion }: ComposeRequest): string {
    if (matches.length === 0) {
      return GREETING.test(message.toLowerCase()) ? GREETING_RESPONSE : FOLLOW_UP_QUESTIONS;
    }

    const parts = [this.intro(emotion), ''];
    for (const property of matches) {
      parts.push(...this.propertyLines(property), '');
    }
    parts.push(this.closing(emotion));
    return parts.join('\n');
  }

  private intro(emotion: EmotionProfile): string {
    if (emotion.enthusiasmLevel > 0.6) {
      return "I'm excited to help you! I found some perfect properties that match your needs:";
    }
    if (emotion.toneAnalysis.professional > 0.7) {
      return "Excellent. I've identified several professional properties that meet your requirements:";
    }
    return 'Great! I found some excellent properties that would be perfect for you:';
  }

  private propertyLines(property: MatchedProperty): string[] {
    const lines = [
      `🏢 **${property.address}**`,
      `   • ${formatSqFt(property.sizeSqFt)} square feet on Floor ${property.floor}, Suite ${property.suite}`,
      `   • ${formatRate(property.rentPerSqFtYear)}/sq ft/year (${formatMoney(property.monthlyRent)}/month)`,
      `   • Annual rent: ${formatMoney(property.annualRent)}`,
      `   • Contact: ${property.contactName} (${property.contactEmail})`
    ];
    if (property.cultureScore > 0) {
      lines.push('   • ✨ Strong culture match');
    }
    return lines;
  }

  private closing(emotion: EmotionProfile): string {
    return emotion.enthusiasmLevel > 0.7
      ? 'These spaces would be fantastic for your team! Would you like me to arrange virtual tours right away?'
      : 'Would you like more details about any of these properties or help scheduling a tour?';
  }
}
