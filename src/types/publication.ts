/**
 * Publication record, normalized from the publications table.
 * Identified by `key` for checkpointing; never mutated after loading.
 */
export interface Publication {
    /** Stable identity: the key column when present, otherwise `row-<index>` */
    key: string;

    /** Position in the input file (0-indexed) */
    index: number;

    title: string;

    /** Publication year (null when the cell is empty or unparseable) */
    year: number | null;

    /** Author names as they appear in the source, in order */
    authors: string[];

    doi: string | null;

    type: string | null;

    /** All original columns, preserved for the output table */
    row: Record<string, string>;
}

/**
 * Grant record. The full grant set is held in memory and treated as read-only.
 */
export interface Grant {
    title: string;

    /** Primary (chief) investigator, raw name */
    primaryInvestigator: string;

    /** Other investigators, raw names */
    otherInvestigators: string[];

    /** Null when missing or unparseable; such a grant never passes the temporal filter */
    startDate: Date | null;
    endDate: Date | null;

    /** External identifier written to the output */
    projectCode: string;

    description: string | null;
}
