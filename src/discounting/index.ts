export { discountClassical } from './classical.js';
export {
  discountContextual,
  discountThetaContextual,
  generalizationMatrix,
  thetaGeneralizationMatrix,
  type BlockRate,
  type ContextRates,
  type GeneralizationMatrix,
} from './contextual.js';
