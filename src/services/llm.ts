//OpenAI-backed structuring pass for the PDF adapter
import OpenAI from 'openai';
import { env } from '../config/env.js';
import { JURISDICTIONS } from '../models/index.js';
import { ExtractionError, describeCause } from '../errors.js';
import type { PayloadStructurer } from './pdf-extractor.js';

export interface StructurerOptions {
  model: string;
  temperature: number;
}

const SYSTEM_PROMPT = `You extract data from Brazilian fiscal documents (NF-e / DANFE / NFC-e).
Return a single JSON object with exactly these keys:
- operationCode: the CFOP of the operation, 4 digits, as a string
- origin: UF of the issuer (one of ${JURISDICTIONS.filter(j => j !== 'OTHER').join(', ')}), or null
- destination: UF of the recipient, same codes, or null
- totalValue: total value of the document as a number
- documentKey: the 44-digit access key as a string, or null
- issuer, recipient: { name, taxId: CNPJ or CPF digits, stateRegistration: IE or "ISENTO", stateRegistrationIndicator: indIEDest } or null
- taxTotals: { icmsBase, icms, ipi, pis, cofins } as numbers or null
- items: array of { description: string, productCode: 8-digit NCM string or null, value: number, quantity: number or null, unitPrice: number or null,
  itemCode: cProd or null, unit: uCom or null, cest: 7-digit CEST or null,
  taxes: { icmsOrigin, icmsCst, icmsCsosn, icmsValue, ipiCst, ipiValue, pisCst, pisValue, cofinsCst, cofinsValue } or null }
Use null for anything not present in the document. Never invent values.`;

export class OpenAiStructurer implements PayloadStructurer {
  constructor(private client: OpenAI, private options: StructurerOptions) {}

  async structure(text: string): Promise<unknown> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: this.options.temperature,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: text },
      ],
    });

    const content = completion.choices[0]?.message.content;
    if (!content) throw new ExtractionError('Structuring model returned an empty response');
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new ExtractionError(`Structuring model returned invalid JSON: ${describeCause(err)}`, { cause: err });
    }
  }
}

//undefined without an API key: the PDF adapter then reports that no structuring model is configured
export function createOpenAiStructurer(): OpenAiStructurer | undefined {
  if (!env.OPENAI_API_KEY) return undefined;
  return new OpenAiStructurer(new OpenAI({ apiKey: env.OPENAI_API_KEY }), { model: env.LLM_MODEL, temperature: env.LLM_TEMPERATURE });
}
