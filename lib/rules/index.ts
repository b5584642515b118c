export { aspectedHouses, aspects, aspectsSign, conjunct, houseFrom, houseLord, houseSign } from './aspects';
export { DOSHA_RULES, detectDoshas } from './doshas';
export {
    activeDoshas,
    evaluateRules,
    type Dosha,
    type DoshaSeverity,
    type Nature,
    type RuleDescriptor,
    type Yoga,
    type YogaStrength
} from './engine';
export { YOGA_RULES, detectYogas, yogaStrength } from './yogas';
