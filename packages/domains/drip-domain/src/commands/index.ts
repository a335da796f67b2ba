export {
  type AddRuleCommand,
  AddRuleCommandSchema,
  addRuleCommand,
} from './add-rule.js';
export {
  type CreateDripCommand,
  CreateDripCommandSchema,
  createDripCommand,
} from './create-drip.js';
export {
  type UpdateDripCommand,
  UpdateDripCommandSchema,
  updateDripCommand,
} from './update-drip.js';
