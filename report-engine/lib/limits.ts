// the number of VCF files we will have in flight at once - beyond this files
// queue until a slot frees up
export const MAX_CONCURRENT_FILES = 48;

// copy number calls are only trustworthy with a strong p-value - anything above
// this cutoff is dropped no matter what thresholds have been asked for
export const CNV_PVALUE_CUTOFF = 0.00005;

// fusions need at least this many molecular reads to be reported (unless overridden)
export const DEFAULT_FUSION_READ_THRESHOLD = 2;

// SNV/indel calls need *more* than this many alt molecules to be reported
export const DEFAULT_ALT_MOLECULAR_COVERAGE = 1;

// the oldest vcfExtractor that knows how to deal with cfDNA data
export const MINIMUM_VCF_EXTRACTOR_VERSION = "7.9";
