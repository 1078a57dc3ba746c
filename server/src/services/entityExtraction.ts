import { segmentSentences } from './textNormalizer';

type EntityMap = Record<string, string[]>;

const PROCEDURE_NOUNS =
  'surgery|procedure|operation|repair|replacement|resection|biopsy|implantation|removal|excision|amputation|transplantation|bypass|angioplasty|catheterization|endoscopy|colonoscopy|bronchoscopy|arthroscopy';
const MEDICATION_FORMS =
  'mg|mcg|g|ml|units|tabs|capsules|pills|patch|injection|infusion|solution|suspension|syrup|cream|ointment|gel|spray|inhaler|nebulizer';
const ANATOMY_NOUNS =
  'heart|lung|liver|kidney|brain|spine|spinal cord|stomach|intestine|colon|rectum|bladder|uterus|ovary|testicle|prostate|breast|skin|muscle|bone|joint|artery|vein|nerve|eye|ear|nose|throat|mouth|tongue|esophagus|trachea|bronchus|pancreas|gallbladder|adrenal|thyroid|pituitary|hypothalamus|cerebellum|cerebrum|cortex|ventricle|atrium|aorta|carotid|femoral|radial|ulnar|tibial|fibular|humerus|radius|ulna|femur|tibia|fibula|patella|calcaneus|talus|metatarsal|phalanx|cranium|mandible|maxilla|clavicle|scapula|sternum|rib|vertebra|pelvis|ilium|ischium|pubis|sacrum|coccyx';
// Entity spans stop at 200 characters.
const SPAN = String.raw`[\w\s\-,]{1,200}`;

const DURATION_UNITS = 'days|day|weeks|week|months|month|years|year|hours|hour|minutes|minute|seconds|second';

// Capture group 1 is the entity. Sources only; flags are added per scan.
const ENTITY_PATTERNS: Readonly<Record<string, readonly string[]>> = {
  DIAGNOSIS: [
    String.raw`\b(?:diagnosed with|diagnosis of|assessment of|impression of|assessment:|impression:|diagnosis:|dx:)\s+(${SPAN})`,
    String.raw`\b(?:suffers from|suffering from|known case of|has a history of)\s+(${SPAN})`,
    String.raw`\b(?:presented with|presents with|complains of|complained of|reports|reported)\s+(${SPAN})`,
  ],
  PROCEDURE: [
    String.raw`\b(?:underwent|undergoing|scheduled for|performed|will undergo|had|has had)\s+(${SPAN}(?:${PROCEDURE_NOUNS}))`,
    String.raw`\b(?:status post|s/p)\s+(${SPAN}(?:${PROCEDURE_NOUNS}))`,
  ],
  MEDICATION: [
    String.raw`\b(?:prescribed|taking|started on|continues on|maintained on|given|administered|received)\s+(${SPAN}(?:${MEDICATION_FORMS}))`,
    String.raw`\b(?:medication:|medications:|meds:|current medications:|med list:|medication list:)\s+(${SPAN})`,
  ],
  ANATOMY: [String.raw`\b(?:in the|of the|at the|on the|involving the|affecting the)\s+(${SPAN}(?:${ANATOMY_NOUNS}))`],
  SEVERITY: [
    String.raw`\b(mild|moderate|severe|critical|extreme|minimal|significant|marked|pronounced|substantial|considerable|extensive|profound|slight|minor|major)\s+(${SPAN})`,
  ],
  DURATION: [
    String.raw`\b(?:for|over|during|throughout|within|after|before|since|lasting|persisting)\s+(${SPAN}(?:${DURATION_UNITS}))`,
    String.raw`\b(acute|chronic|subacute|recurrent|persistent|intermittent|transient|episodic|paroxysmal|constant|continuous|ongoing|longstanding)\s+(${SPAN})`,
  ],
};

export const ENTITY_TYPES: readonly string[] = Object.keys(ENTITY_PATTERNS);

const DEFAULT_EXCLUDED_WORDS = ['the', 'and', 'with', 'without', 'from', 'to', 'in', 'on', 'at', 'by', 'for', 'of', 'a', 'an'];

/**
 * Regex-based entity extraction over abbreviation-aware sentences. Labels without
 * patterns (SYMPTOM, TEST, TREATMENT in the default config) come back empty.
 */
export function extractEntities(text: string, entityTypes: readonly string[] = ENTITY_TYPES): EntityMap {
  const entities: EntityMap = Object.fromEntries(entityTypes.map((type): [string, string[]] => [type, []]));
  const sentences = segmentSentences(text);

  for (const sentence of sentences) {
    for (const type of entityTypes) {
      const sources = Object.prototype.hasOwnProperty.call(ENTITY_PATTERNS, type) ? ENTITY_PATTERNS[type] : [];
      for (const source of sources) {
        for (const match of sentence.matchAll(new RegExp(source, 'gi'))) {
          const entity = match[1]?.trim();
          if (entity && !entities[type].includes(entity)) {
            entities[type].push(entity);
          }
        }
      }
    }
  }

  return entities;
}

export function filterEntities(entities: EntityMap, minLength = 3, excludeWords: readonly string[] = DEFAULT_EXCLUDED_WORDS): EntityMap {
  return Object.fromEntries(
    Object.entries(entities).map(([type, list]): [string, string[]] => [
      type,
      list.filter((entity) => entity.length >= minLength && !excludeWords.includes(entity.toLowerCase())),
    ])
  );
}

export function normalizeEntities(entities: EntityMap): EntityMap {
  return Object.fromEntries(
    Object.entries(entities).map(([type, list]): [string, string[]] => {
      const normalized: string[] = [];
      for (const entity of list) {
        const value = entity
          .toLowerCase()
          .replace(/[.,;:!?]+$/, '')
          .replace(/^(a|an|the)\s+/, '');
        if (value && !normalized.includes(value)) normalized.push(value);
      }
      return [type, normalized];
    })
  );
}

export type { EntityMap };
