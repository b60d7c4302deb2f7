import { Command, FlagSet } from '@layerflag/flag-config';
import { flagsSections } from './flags.js';
import { Section, renderSections } from './section.js';

export function subcommandsSection(subcommands: readonly Command[]): Section {
    const lines = subcommands.map(c => `${c.name}\t${c.shortHelp}`);
    if (lines.length === 0) {
        lines.push('(no subcommands)');
    }
    return new Section('SUBCOMMANDS', lines, { columns: true });
}

/**
 * Help for a bare flag set: its name, optional detail lines, then its flags.
 */
export function flagSetHelp(flagSet: FlagSet, ...details: string[]): string {
    const sections = [new Section('', [flagSet.getName()])];
    if (details.length > 0) {
        sections.push(new Section('', details));
    }
    sections.push(...flagsSections(flagSet));
    return renderSections(sections);
}

/**
 * Help for the selected command of the last parse, or for command itself
 * when it has not been parsed.
 */
export function commandHelp(command: Command): string {
    const cmd = command.getSelected() ?? command;

    const title = cmd.shortHelp ? `${cmd.name} -- ${cmd.shortHelp}` : cmd.name;
    const sections = [new Section('', [title])];

    if (cmd.usage) {
        sections.push(new Section('USAGE', [cmd.usage]));
    }
    if (cmd.longHelp) {
        sections.push(new Section('', [cmd.longHelp]));
    }

    const subcommands = cmd.getSubcommands();
    if (subcommands.length > 0) {
        sections.push(subcommandsSection(subcommands));
    }

    sections.push(...flagsSections(cmd.getFlags()));
    return renderSections(sections);
}
