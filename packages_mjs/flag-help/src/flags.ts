import { Flag, FlagSet } from '@layerflag/flag-config';
import { Section, alignColumns } from './section.js';

export interface FlagSpec {
    flag: Flag;
    /** "-f, --foo STR" */
    args: string;
    /** "value of foo (default: bar)" */
    help: string;
}

/**
 * padLongOnly indents long-only flags so their names line up with flags that
 * have a short name.
 */
export function flagSpec(flag: Flag, padLongOnly: boolean = false): FlagSpec {
    const shortName = flag.getShortName();
    const longName = flag.getLongName();

    let args: string;
    if (shortName !== undefined && longName !== undefined) {
        args = `-${shortName}, --${longName}`;
    } else if (shortName !== undefined) {
        args = `-${shortName}`;
    } else {
        args = `${padLongOnly ? '    ' : ''}--${longName ?? ''}`;
    }

    const placeholder = flag.getPlaceholder();
    if (placeholder) {
        args = `${args} ${placeholder}`;
    }

    let help = flag.getUsage();
    const def = flag.getDefault();
    if (def !== '') {
        help = `${help} (default: ${def})`;
    }

    return { flag, args, help };
}

/**
 * One section per declaring flag set, own flags first. The first is titled
 * FLAGS, ancestors FLAGS (name). Columns are aligned across all sections.
 */
export function flagsSections(flagSet: FlagSet): Section[] {
    const order: string[] = [];
    const groups = new Map<string, Flag[]>();
    for (const flag of flagSet.getAllFlags()) {
        const group = flag.getFlagSetName();
        const bucket = groups.get(group);
        if (bucket) {
            bucket.push(flag);
        } else {
            order.push(group);
            groups.set(group, [flag]);
        }
    }

    const all = order.flatMap(name => groups.get(name) ?? []);
    const padLongOnly = all.some(f => f.getShortName() !== undefined);
    const lines = alignColumns(all.map(f => {
        const spec = flagSpec(f, padLongOnly);
        return [spec.args, spec.help];
    }));

    const sections: Section[] = [];
    let offset = 0;
    order.forEach((name, i) => {
        const count = groups.get(name)?.length ?? 0;
        const title = i === 0 ? 'FLAGS' : `FLAGS (${name})`;
        sections.push(new Section(title, lines.slice(offset, offset + count)));
        offset += count;
    });
    return sections;
}
