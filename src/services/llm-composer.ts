import type { ComposeRequest, ComposedResponse, EmotionProfile, ResponseComposer } from '../types';
import { formatPropertyContext } from '../utils/format';
import type { ChatClient, ChatMessage } from './openai';

export function emotionGuidance(emotion: EmotionProfile): string {
  const notes: string[] = [];

  if (emotion.enthusiasmLevel > 0.7) {
    notes.push('The client sounds very excited and enthusiastic! Match their energy and be more detailed about exciting features.');
  } else if (emotion.enthusiasmLevel < 0.3) {
    notes.push('The client sounds more reserved. Be professional and focus on practical benefits.');
  }
  if (emotion.toneAnalysis.professional > 0.7) {
    notes.push('Use a professional, business-focused tone.');
  }
  if (emotion.toneAnalysis.uncertain > 0.5) {
    notes.push('The client seems uncertain - provide reassurance and clear information.');
  }

  return notes.join(' ');
}

export function buildSystemPrompt(request: ComposeRequest): string {
  return `You are a Commercial Real Estate Voice AI assistant helping clients find commercial space that fits their business.

Your personality:
- Warm, professional, and knowledgeable about commercial real estate
- Attentive to the client's needs and mood
- Skilled at matching properties to company culture and practical needs

${emotionGuidance(request.emotion)}

Current property recommendations and context:
${formatPropertyContext(request.matches, request.requirements)}

Additional knowledge context:
${request.ragContext ?? 'No additional context available.'}

Guidelines:
- Reference specific properties from the recommendations when relevant and never invent listings
- If nothing matches, say so and ask about team size, budget per square foot, and preferred area
- Ask follow-up questions to better understand their needs
- Keep answers conversational; they may be read aloud
- Offer virtual tours when appropriate`;
}

export class LLMComposer implements ResponseComposer {
  readonly name = 'openai';

  constructor(private readonly client: ChatClient) {}

  async compose(request: ComposeRequest): Promise<ComposedResponse> {
    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(request) },
      ...request.history.map(turn => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: request.message }
    ];

    const completion = await this.client.chat(messages);
    return {
      text: completion.content,
      tokensUsed: completion.totalTokens,
      model: this.client.model
    };
  }
}
