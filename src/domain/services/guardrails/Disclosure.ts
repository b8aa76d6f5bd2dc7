export const DISCLAIMER =
  'This content is for educational purposes only and does not constitute financial advice. ' +
  'Please consult with a qualified financial professional before making financial decisions.';

export const CONSENT_REQUIRED_MESSAGE =
  'Personalized insights need your consent to analyze account data. Grant consent to see recommendations.';
