export interface SampleMessage {
  title: string;
  message: string;
}

export const SAMPLE_MESSAGES: readonly SampleMessage[] = [
  {
    title: 'Joy + Anxiety',
    message:
      'Feeling ecstatic about joining the new AI research team, though a bit anxious about the deadlines ahead.',
  },
  {
    title: 'Sadness + Anger',
    message: "I can't believe I failed that test again. I'm so disappointed and frustrated right now.",
  },
  {
    title: 'Joy + Excitement',
    message: "Finally got the job offer! I'm thrilled and can't wait to start this new journey.",
  },
];
