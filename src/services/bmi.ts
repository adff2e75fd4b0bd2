import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { BmiCategoryKey, BmiClassification, BmiResourceType, BmiResult } from '../types/index.js';
import { ConfigurationError, ToolError, getErrorMessage } from './errors.js';

export const BMI_RESOURCES_PATH = fileURLToPath(new URL('../../data/bmi-resources.json', import.meta.url));

export const BMI_RESOURCE_TYPES: readonly BmiResourceType[] = [
  'categories',
  'health-risks',
  'calculation-guide',
  'healthy-weight-tips',
];

const HEALTHY_BMI_MIN = 18.5;
const HEALTHY_BMI_MAX = 24.9;
const OBESITY_BMI_MIN = 30;

export const BMI_RESOURCE_URI_SCHEME = 'bmi://';

export function bmiResourceUri(type: BmiResourceType): string {
  return `${BMI_RESOURCE_URI_SCHEME}${type}`;
}

const adviceByCategory = z.object({
  underweight: z.array(z.string()),
  normal: z.array(z.string()),
  overweight: z.array(z.string()),
  obese: z.array(z.string()),
});

const bmiResourcesSchema = z.object({
  categories: z.object({
    title: z.string(),
    description: z.string(),
    source: z.string(),
    categories: z.record(z.object({ range: z.string(), description: z.string() })),
  }),
  healthRisks: z.object({
    title: z.string(),
    description: z.string(),
    disclaimer: z.string(),
    risks: adviceByCategory,
  }),
  calculationGuide: z.object({
    title: z.string(),
    description: z.string(),
    formula: z.record(z.string()),
    unitConversions: z.record(z.record(z.string())),
    examples: z.array(z.object({ description: z.string(), calculation: z.string(), category: z.string() })),
    limitations: z.array(z.string()),
  }),
  healthyWeightTips: z.object({
    title: z.string(),
    description: z.string(),
    generalTips: z.array(z.string()),
    categorySpecificAdvice: adviceByCategory,
    whenToSeekHelp: z.array(z.string()),
  }),
});

export type BmiResources = z.infer<typeof bmiResourcesSchema>;

let cachedResources: BmiResources | undefined;

export function loadBmiResources(path: string = BMI_RESOURCES_PATH): BmiResources {
  if (path === BMI_RESOURCES_PATH && cachedResources) {
    return cachedResources;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read BMI reference data from ${path}: ${getErrorMessage(error)}`, { cause: error });
  }

  const parsed = bmiResourcesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid BMI reference data: ${parsed.error.issues[0]?.message ?? 'unknown problem'}`);
  }

  if (path === BMI_RESOURCES_PATH) {
    cachedResources = parsed.data;
  }
  return parsed.data;
}

// Upper bounds are exclusive
const CLASSES: ReadonlyArray<{ below: number; category: string; categoryKey: BmiCategoryKey; referenceKey: string }> = [
  { below: 18.5, category: 'Underweight', categoryKey: 'underweight', referenceKey: 'underweight' },
  { below: 25, category: 'Normal weight', categoryKey: 'normal', referenceKey: 'normal' },
  { below: 30, category: 'Overweight', categoryKey: 'overweight', referenceKey: 'overweight' },
  { below: 35, category: 'Obesity Class I', categoryKey: 'obese', referenceKey: 'obese_class_1' },
  { below: 40, category: 'Obesity Class II', categoryKey: 'obese', referenceKey: 'obese_class_2' },
  { below: Infinity, category: 'Obesity Class III', categoryKey: 'obese', referenceKey: 'obese_class_3' },
];

export function classifyBmi(bmi: number, resources: BmiResources = loadBmiResources()): BmiClassification {
  const match = CLASSES.find(entry => bmi < entry.below) ?? CLASSES[CLASSES.length - 1];
  return {
    category: match.category,
    categoryKey: match.categoryKey,
    referenceKey: match.referenceKey,
    categoryRange: resources.categories.categories[match.referenceKey]?.range ?? '',
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Computes BMI from metric inputs and attaches the matching reference
 * information. Throws an `InvalidArguments` ToolError for non-positive input.
 */
export function calculateBmi(weightKg: number, heightM: number, resources: BmiResources = loadBmiResources()): BmiResult {
  if (!(weightKg > 0)) {
    throw new ToolError('InvalidArguments', 'Weight must be a positive number of kilograms', { parameter: 'weight_kg' });
  }
  if (!(heightM > 0)) {
    throw new ToolError('InvalidArguments', 'Height must be a positive number of meters', { parameter: 'height_m' });
  }

  // Classify on the exact value; rounding is for display only
  const rawBmi = weightKg / (heightM * heightM);
  const bmi = round(rawBmi, 2);
  const classification = classifyBmi(rawBmi, resources);
  const { categoryKey } = classification;
  const advice = resources.healthyWeightTips.categorySpecificAdvice[categoryKey];
  const minKg = round(HEALTHY_BMI_MIN * heightM * heightM, 1);
  const maxKg = round(HEALTHY_BMI_MAX * heightM * heightM, 1);

  return {
    bmi,
    category: classification.category,
    categoryRange: classification.categoryRange,
    weightKg,
    heightM,
    calculation: `${weightKg} / (${heightM})² = ${bmi}`,
    healthyWeightRange: {
      minKg,
      maxKg,
      description: `For your height of ${heightM}m, a healthy weight is between ${minKg}kg and ${maxKg}kg`,
    },
    healthInformation: {
      risks: resources.healthRisks.risks[categoryKey],
      interpretation: `A BMI of ${bmi} falls in the ${classification.category} range (${classification.categoryRange})`,
    },
    recommendations: {
      consultHealthcare: rawBmi < HEALTHY_BMI_MIN || rawBmi >= OBESITY_BMI_MIN,
      lifestyleFocus: advice[0] ?? '',
      monitoring:
        categoryKey === 'normal'
          ? 'Check your weight periodically to stay within the healthy range'
          : 'Track your BMI monthly and review changes with a healthcare provider',
    },
    resources: {
      categories: bmiResourceUri('categories'),
      healthRisks: bmiResourceUri('health-risks'),
      calculationGuide: bmiResourceUri('calculation-guide'),
      healthyWeightTips: bmiResourceUri('healthy-weight-tips'),
    },
    disclaimer: resources.healthRisks.disclaimer,
  };
}

export interface BmiResourceEntry {
  type: BmiResourceType;
  uri: string;
  title: string;
  description: string;
}

/** Resource catalogue published to MCP clients under `bmi://`. */
export function listBmiResources(resources: BmiResources = loadBmiResources()): BmiResourceEntry[] {
  const sections = {
    categories: resources.categories,
    'health-risks': resources.healthRisks,
    'calculation-guide': resources.calculationGuide,
    'healthy-weight-tips': resources.healthyWeightTips,
  } satisfies Record<BmiResourceType, { title: string; description: string }>;

  return BMI_RESOURCE_TYPES.map(type => ({
    type,
    uri: bmiResourceUri(type),
    title: sections[type].title,
    description: sections[type].description,
  }));
}

export function isBmiResourceType(value: string): value is BmiResourceType {
  return BMI_RESOURCE_TYPES.some(type => type === value);
}

export function getBmiResource(type: BmiResourceType | 'all', resources: BmiResources = loadBmiResources()): unknown {
  switch (type) {
    case 'categories':
      return resources.categories;
    case 'health-risks':
      return resources.healthRisks;
    case 'calculation-guide':
      return resources.calculationGuide;
    case 'healthy-weight-tips':
      return resources.healthyWeightTips;
    case 'all':
      return resources;
  }
}
