declare module "vader-sentiment" {
  namespace vader {
    interface PolarityScores {
      compound: number;
      pos: number;
      neu: number;
      neg: number;
    }

    class SentimentIntensityAnalyzer {
      static polarity_scores(text: string): PolarityScores;
    }
  }

  export = vader;
}
