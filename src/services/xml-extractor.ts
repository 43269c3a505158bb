//structural adapter: NF-e XML → payload candidate by direct field mapping
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { DocumentSource, PayloadCandidate } from '../models/index.js';
import { ExtractionError } from '../errors.js';
import { createLogger } from '../logger.js';
import { readDocument, type ExtractionAdapter } from './extraction.js';
import { isRecord, sanitizeCandidate } from './sanitize.js';

const log = createLogger('xml-extractor');

//blocks whose absence means the file is not an NF-e at all; leaf fields inside them are left to the validator
const REQUIRED_BLOCKS = ['emit', 'dest', 'total'] as const;

//infNFe sits under nfeProc when the authorization protocol is attached, directly under NFe otherwise
const INF_NFE_PATHS = ['nfeProc.NFe.infNFe', 'NFe.infNFe'];

export function safeGet(data: unknown, path: string): unknown {
  let node = data;
  for (const key of path.split('.')) {
    if (!isRecord(node)) return undefined;
    node = node[key];
  }
  return node;
}

//leaf text, whether the parser gave a bare value or an element with attributes
function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (isRecord(node) && '#text' in node) return textOf(node['#text']);
  return undefined;
}

function asList(node: unknown): unknown[] {
  if (node === undefined || node === null) return [];
  return Array.isArray(node) ? node : [node];
}

//tax blocks wrap a single situation-specific group (ICMS00, ICMSSN101, IPITrib, PISAliq, …)
function taxGroup(imposto: unknown, tax: string): unknown {
  const block = safeGet(imposto, tax);
  return isRecord(block) ? Object.values(block).find(isRecord) : undefined;
}

function partyOf(node: unknown): Record<string, unknown> | undefined {
  if (!isRecord(node)) return undefined;
  return {
    name: textOf(node['xNome']),
    taxId: textOf(node['CNPJ']) ?? textOf(node['CPF']),
    stateRegistration: textOf(node['IE']),
    stateRegistrationIndicator: textOf(node['indIEDest']),
  };
}

function taxesOf(imposto: unknown): Record<string, unknown> | undefined {
  if (!isRecord(imposto)) return undefined;
  const icms = taxGroup(imposto, 'ICMS'), ipi = taxGroup(imposto, 'IPI');
  const pis = taxGroup(imposto, 'PIS'), cofins = taxGroup(imposto, 'COFINS');
  return {
    icmsOrigin: textOf(safeGet(icms, 'orig')),
    icmsCst: textOf(safeGet(icms, 'CST')),
    icmsCsosn: textOf(safeGet(icms, 'CSOSN')),
    icmsValue: textOf(safeGet(icms, 'vICMS')),
    ipiCst: textOf(safeGet(ipi, 'CST')),
    ipiValue: textOf(safeGet(ipi, 'vIPI')),
    pisCst: textOf(safeGet(pis, 'CST')),
    pisValue: textOf(safeGet(pis, 'vPIS')),
    cofinsCst: textOf(safeGet(cofins, 'CST')),
    cofinsValue: textOf(safeGet(cofins, 'vCOFINS')),
  };
}

export class XmlExtractor implements ExtractionAdapter {
  readonly kind = 'structured' as const;

  private parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (name: string) => name === 'det',
  });

  async extract(document: DocumentSource): Promise<PayloadCandidate> {
    const xml = Buffer.from(await readDocument(document)).toString('utf8');
    return this.extractFromString(xml);
  }

  extractFromString(xml: string): PayloadCandidate {
    const check = XMLValidator.validate(xml);
    if (check !== true) {
      throw new ExtractionError(`Malformed XML at line ${check.err.line}: ${check.err.msg}`);
    }

    const tree: unknown = this.parser.parse(xml);
    const infNFe = INF_NFE_PATHS.map(p => safeGet(tree, p)).find(isRecord);
    if (!infNFe) throw new ExtractionError(`Invalid NF-e structure: 'infNFe' not found`);

    const missing = REQUIRED_BLOCKS.filter(b => !isRecord(infNFe[b]));
    if (missing.length) {
      throw new ExtractionError(`Invalid NF-e structure: missing ${missing.map(b => `'${b}'`).join(', ')}`, {
        issues: missing.map(b => ({ path: `infNFe.${b}`, message: 'block is missing' })),
      });
    }

    const det = asList(infNFe['det']);
    const firstProd = safeGet(det[0], 'prod');

    const candidate: PayloadCandidate = {
      operationCode: textOf(safeGet(firstProd, 'CFOP')),
      origin: textOf(safeGet(infNFe, 'emit.enderEmit.UF')),
      destination: textOf(safeGet(infNFe, 'dest.enderDest.UF')),
      totalValue: textOf(safeGet(infNFe, 'total.ICMSTot.vNF')),
      documentKey: textOf(infNFe['@_Id']),
      issuer: partyOf(infNFe['emit']),
      recipient: partyOf(infNFe['dest']),
      taxTotals: {
        icmsBase: textOf(safeGet(infNFe, 'total.ICMSTot.vBC')),
        icms: textOf(safeGet(infNFe, 'total.ICMSTot.vICMS')),
        ipi: textOf(safeGet(infNFe, 'total.ICMSTot.vIPI')),
        pis: textOf(safeGet(infNFe, 'total.ICMSTot.vPIS')),
        cofins: textOf(safeGet(infNFe, 'total.ICMSTot.vCOFINS')),
      },
      items: det.map(d => {
        const prod = safeGet(d, 'prod');
        return {
          description: textOf(safeGet(prod, 'xProd')),
          productCode: textOf(safeGet(prod, 'NCM')),
          value: textOf(safeGet(prod, 'vProd')),
          quantity: textOf(safeGet(prod, 'qCom')),
          unitPrice: textOf(safeGet(prod, 'vUnCom')),
          itemCode: textOf(safeGet(prod, 'cProd')),
          unit: textOf(safeGet(prod, 'uCom')),
          cest: textOf(safeGet(prod, 'CEST')),
          taxes: taxesOf(safeGet(d, 'imposto')),
        };
      }),
    };

    log.debug(`NF-e parsed: cfop=${String(candidate.operationCode)} items=${det.length}`);
    return sanitizeCandidate(candidate);
  }
}
