import type { BehaviorSignals } from '../entities/BehaviorSignals.js';
import type { EducationItem, PartnerOffer } from '../entities/CatalogItem.js';
import type { PersonaType } from '../entities/Persona.js';
import type { Rationale, RationaleCitation } from '../entities/Recommendation.js';
import type { SignalTag } from '../entities/SignalTag.js';
import { formatMinorUnits, formatPercent } from './MoneyFormatter.js';

export type RationaleSubject = { kind: 'education'; item: EducationItem } | { kind: 'offer'; item: PartnerOffer };

export interface RationaleInput {
  personaType: PersonaType;
  signals: BehaviorSignals;
  activeSignalTags: readonly SignalTag[];
  subject: RationaleSubject;
  currency: string;
}

interface Observation {
  sentence: string;
  citations: RationaleCitation[];
}

type Observe = (signals: BehaviorSignals, money: (amount: number) => string) => Observation;

const OBSERVATIONS: Record<PersonaType, Observe> = {
  high_utilization: ({ credit }, money) => {
    const utilization = formatPercent(credit.overallUtilization);
    const balance = money(credit.totalBalance);
    const limit = money(credit.totalLimit);
    const citations: RationaleCitation[] = [
      { signal: 'credit.overallUtilization', value: utilization },
      { signal: 'credit.totalBalance', value: balance },
      { signal: 'credit.totalLimit', value: limit },
    ];
    let sentence = `Your credit utilization is ${utilization} with ${balance} in balances against ${limit} in limits.`;

    if (credit.monthlyInterest > 0) {
      const interest = money(credit.monthlyInterest);
      sentence += ` That works out to about ${interest} a month in interest.`;
      citations.push({ signal: 'credit.monthlyInterest', value: interest });
    }

    return { sentence, citations };
  },
  variable_income: ({ income }) => {
    const gap = `${income.medianGapDays} days`;
    const buffer = `${income.bufferMonths.toFixed(1)} months`;
    return {
      sentence: `Your pay arrives about every ${gap}, and your cash-flow buffer covers ${buffer} of expenses.`,
      citations: [
        { signal: 'income.medianGapDays', value: gap },
        { signal: 'income.bufferMonths', value: buffer },
      ],
    };
  },
  debt_consolidator: ({ credit }, money) => {
    const cards = credit.cards.filter((card) => card.balance > 0).length;
    const utilization = formatPercent(credit.overallUtilization);
    const interest = money(credit.monthlyInterest);
    return {
      sentence: `You carry balances on ${cards} cards at ${utilization} overall utilization, paying about ${interest} a month in interest.`,
      citations: [
        { signal: 'credit.cardsWithBalance', value: `${cards} cards` },
        { signal: 'credit.overallUtilization', value: utilization },
        { signal: 'credit.monthlyInterest', value: interest },
      ],
    };
  },
  subscription_heavy: ({ subscriptions }, money) => {
    const count = `${subscriptions.count} recurring subscriptions`;
    const spend = money(subscriptions.monthlyRecurringSpend);
    const share = formatPercent(subscriptions.percentageOfSpending);
    return {
      sentence: `You have ${count} totalling ${spend} a month, about ${share} of your spending.`,
      citations: [
        { signal: 'subscriptions.count', value: count },
        { signal: 'subscriptions.monthlyRecurringSpend', value: spend },
        { signal: 'subscriptions.percentageOfSpending', value: share },
      ],
    };
  },
  savings_builder: ({ savings }, money) => {
    const growth = formatPercent(savings.growthRate);
    const inflow = money(savings.monthlyInflow);
    return {
      sentence: `Your savings grew ${growth} over this period, about ${inflow} a month.`,
      citations: [
        { signal: 'savings.growthRate', value: growth },
        { signal: 'savings.monthlyInflow', value: inflow },
      ],
    };
  },
  balanced: ({ credit, savings }, money) => {
    const utilization = formatPercent(credit.overallUtilization);
    const saved = money(savings.totalBalance);
    return {
      sentence: `Your finances look steady: credit utilization is ${utilization} and you hold ${saved} in savings.`,
      citations: [
        { signal: 'credit.overallUtilization', value: utilization },
        { signal: 'savings.totalBalance', value: saved },
      ],
    };
  },
};

const describeSubject = (subject: RationaleSubject): string =>
  subject.kind === 'education'
    ? `"${subject.item.title}" walks through practical next steps for this pattern.`
    : `${subject.item.title} from ${subject.item.provider} is one option people in a similar position use.`;

export const composeRationale = (input: RationaleInput): Rationale => {
  const money = (amount: number): string => formatMinorUnits(amount, input.currency);
  const observation = OBSERVATIONS[input.personaType](input.signals, money);

  return {
    text: `${observation.sentence} ${describeSubject(input.subject)}`,
    citations: observation.citations,
    keySignals: input.subject.item.signalTags.filter((tag) => input.activeSignalTags.includes(tag)),
  };
};
