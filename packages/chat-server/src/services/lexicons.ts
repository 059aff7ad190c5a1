// English-only. Extend these lists rather than the detectors.

export const EMERGENCY_PHRASES = [
    'severe chest pain',
    'crushing chest pain',
    'chest pain',
    'difficulty breathing',
    "can't breathe",
    'cannot breathe',
    'can not breathe',
    'unable to breathe',
    'not breathing',
    'struggling to breathe',
    'unconscious',
    'unresponsive',
    'passed out',
    'uncontrolled bleeding',
    "bleeding that won't stop",
    "won't stop bleeding",
    'severe bleeding',
    'heart attack',
    'having a stroke',
    'seizure',
    'overdose',
    'suicidal',
    'kill myself',
    'throat is closing',
] as const;

export const RECORD_INTENT_PHRASES = [
    'my history',
    'my medical history',
    'my health history',
    'my medication',
    'my medications',
    'my meds',
    'my prescription',
    'my prescriptions',
    'my test results',
    'my results',
    'my lab results',
    'my labs',
    'my last blood test',
    'my blood test',
    'my blood work',
    'my records',
    'my medical records',
    'my allergies',
    'my diagnosis',
    'my conditions',
    'my vaccinations',
    'my last visit',
] as const;
