// Task kinds the amplicon clustering pipeline emits, in stage order
export const PIPELINE_TASK_KINDS = [
  "qc",
  "fastqc",
  "kmer_freqs",
  "read_clustering",
  "split_by_cluster",
  "read_correction",
  "draft_selection",
  "racon_pass",
  "medaka_pass",
  "consensus_classification",
  "join_results",
  "get_abundances",
  "plot_abundances",
  "output_documentation",
] as const;

export type PipelineTaskKind = (typeof PIPELINE_TASK_KINDS)[number];
