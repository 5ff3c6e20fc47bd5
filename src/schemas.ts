import { z } from 'zod';

// CSV cells arrive as text such as "$28.00" or "2,500"
const money = z
  .string()
  .transform(value => value.replace(/[$,\s]/g, ''))
  .pipe(z.coerce.number().positive());

const optionalMoney = z
  .string()
  .optional()
  .transform(value => (value === undefined ? '' : value.replace(/[$,\s]/g, '')))
  .pipe(z.union([z.literal('').transform(() => undefined), z.coerce.number().positive()]));

// "Floor 5", "5th" and "5" all mean floor 5
const floor = z
  .string()
  .transform(value => value.match(/\d+/)?.[0] ?? '')
  .pipe(z.coerce.number().int().min(0));

export const PropertyRowSchema = z
  .object({
    unique_id: z.string().trim().min(1),
    'Property Address': z.string().trim().min(1),
    Floor: floor,
    Suite: z.string().trim().default(''),
    'Size (SF)': money,
    'Rent/SF/Year': money,
    'Associate 1': z.string().trim().default(''),
    'BROKER Email ID': z.string().trim().default(''),
    'Annual Rent': optionalMoney,
    'Monthly Rent': optionalMoney
  })
  .transform(row => {
    const annualRent = row['Annual Rent'] ?? row['Size (SF)'] * row['Rent/SF/Year'];
    return {
      id: row.unique_id,
      address: row['Property Address'],
      floor: row.Floor,
      suite: row.Suite,
      sizeSqFt: row['Size (SF)'],
      rentPerSqFtYear: row['Rent/SF/Year'],
      annualRent,
      monthlyRent: row['Monthly Rent'] ?? Math.round((annualRent / 12) * 100) / 100,
      contactName: row['Associate 1'],
      contactEmail: row['BROKER Email ID']
    };
  });

const unit = z.number().min(0).max(1);

export const EmotionDataSchema = z.object({
  emotionScore: unit,
  enthusiasmLevel: unit,
  professionalLevel: unit.optional(),
  confidenceLevel: unit.optional(),
  uncertaintyLevel: unit.optional(),
  voicePace: z.number().positive().optional(),
  toneAnalysis: z
    .object({
      professional: unit.optional(),
      excited: unit.optional(),
      confident: unit.optional(),
      uncertain: unit.optional()
    })
    .optional()
});

export type EmotionData = z.infer<typeof EmotionDataSchema>;

export const ConversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string()
});

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, 'Message is required'),
  conversationHistory: z.array(ConversationTurnSchema).default([]),
  ragContext: z.string().optional(),
  emotionData: EmotionDataSchema.optional()
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export const SpeechRequestSchema = z.object({
  text: z.string().min(1, 'Text is required'),
  voiceId: z.string().optional()
});
