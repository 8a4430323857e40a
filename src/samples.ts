export type SampleText = {
  id: string;
  label: string;
  text: string;
};

/** 页面上"试一试"用的示例段落 */
export const SAMPLE_TEXTS: readonly SampleText[] = [
  {
    id: "generated-overview",
    label: "Generated: product overview",
    text:
      "Modern project management platforms help teams coordinate tasks, track progress, and share " +
      "documents in a single place. These tools provide dashboards that summarize key metrics, and " +
      "they integrate with existing services so that information flows smoothly between departments. " +
      "As a result, organizations can improve transparency and make better decisions over time.",
  },
  {
    id: "human-notes-zh",
    label: "Human: field notes (Chinese)",
    text:
      "早上六点被楼下修路的电钻吵醒，干脆起来煮咖啡。窗外雾很重，对面那栋楼只剩个轮廓。" +
      "邻居家的猫又蹲在空调外机上，看见我就跑了。",
  },
  {
    id: "human-rant",
    label: "Human: short rant",
    text:
      "Missed the bus. Again! The app said four minutes, then seven, then it just vanished from the " +
      "map like it never existed. I walked. Honestly, the walk was nicer than the bus would have been, " +
      "but that's not the point, is it?",
  },
];
