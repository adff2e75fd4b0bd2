/**
 * BMI calculation types
 */

export type BmiCategoryKey = 'underweight' | 'normal' | 'overweight' | 'obese';

export interface BmiClassification {
  category: string;
  categoryKey: BmiCategoryKey;
  categoryRange: string;
  referenceKey: string;
}

export interface BmiResult {
  bmi: number;
  category: string;
  categoryRange: string;
  weightKg: number;
  heightM: number;
  calculation: string;
  healthyWeightRange: {
    minKg: number;
    maxKg: number;
    description: string;
  };
  healthInformation: {
    risks: string[];
    interpretation: string;
  };
  recommendations: {
    consultHealthcare: boolean;
    lifestyleFocus: string;
    monitoring: string;
  };
  resources: Record<string, string>;
  disclaimer: string;
}

export type BmiResourceType = 'categories' | 'health-risks' | 'calculation-guide' | 'healthy-weight-tips';
