import { BMI_RESOURCE_TYPES, calculateBmi, getBmiResource, isBmiResourceType } from '../../bmi.js';
import { ToolError } from '../../errors.js';
import { definePlainTool } from '../registry.js';
import { param } from '../validator.js';

export const calculateBmiTool = definePlainTool({
  name: 'calculate_bmi',
  description: 'Calculate Body Mass Index from weight in kilograms and height in meters, with category and health guidance',
  parameters: {
    weight_kg: param.number('Weight in kilograms'),
    height_m: param.number('Height in meters'),
  },
  handler: ({ weight_kg, height_m }, { logger }) => {
    const result = calculateBmi(weight_kg, height_m);
    logger.debug(`BMI ${result.bmi} (${result.category})`);
    return result;
  },
});

export const getBmiResourcesTool = definePlainTool({
  name: 'get_bmi_resources',
  description: 'Reference information about BMI: categories, health-risks, calculation-guide, healthy-weight-tips, or all',
  parameters: {
    resource_type: param.string('Which resource to return').default('all'),
  },
  handler: ({ resource_type }) => {
    const type = resource_type.trim().toLowerCase();
    if (type === 'all') {
      return getBmiResource('all');
    }
    if (!isBmiResourceType(type)) {
      throw new ToolError(
        'InvalidArguments',
        `Unknown resource type '${resource_type}'. Valid types: ${[...BMI_RESOURCE_TYPES, 'all'].join(', ')}`
      );
    }
    return getBmiResource(type);
  },
});
