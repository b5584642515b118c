import {
    DIGNITY_TABLE,
    naturalRelationship,
    signLord,
    type Planet
} from '../jyotish/constants';

export type Dignity = 'exalted' | 'debilitated' | 'moolatrikona' | 'own' | 'friendly' | 'neutral' | 'enemy';

/**
 * Dignity of a planet at a sidereal sign/degree. Checked in order:
 * exaltation sign, debilitation sign, moolatrikona range, own sign, then the
 * natural relationship with the sign lord.
 */
export function dignityOf(planet: Planet, sign: number, degree: number): Dignity {
    const config = DIGNITY_TABLE[planet];

    if (sign === config.exaltationSign) return 'exalted';
    if (sign === config.debilitationSign) return 'debilitated';

    const mt = config.moolatrikona;
    if (mt && sign === mt.sign && degree >= mt.from && degree < mt.to) return 'moolatrikona';
    if (config.ownSigns.includes(sign)) return 'own';

    const lord = signLord(sign);
    if (lord === planet) return 'own';

    const relation = naturalRelationship(planet, lord);
    return relation === 'friend' ? 'friendly' : relation;
}

export function isStrongDignity(dignity: Dignity): boolean {
    return dignity === 'exalted' || dignity === 'moolatrikona' || dignity === 'own';
}
