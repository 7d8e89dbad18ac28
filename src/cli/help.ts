import type { Command } from 'commander';
import kleur from 'kleur';

type Stylizer = (text: string) => string;

interface HelpColors {
  banner: Stylizer;
  subtitle: Stylizer;
  section: Stylizer;
  bullet: Stylizer;
  command: Stylizer;
  option: Stylizer;
  argument: Stylizer;
  description: Stylizer;
  muted: Stylizer;
  accent: Stylizer;
}

const createColorWrapper = (isTty: boolean) => (styler: Stylizer): Stylizer => (text) =>
  isTty ? styler(text) : text;

export function applyHelpStyling(program: Command, version: string, isTty: boolean): void {
  const wrap = createColorWrapper(isTty);
  const colors: HelpColors = {
    banner: wrap((text) => kleur.bold().blue(text)),
    subtitle: wrap((text) => kleur.dim(text)),
    section: wrap((text) => kleur.bold().white(text)),
    bullet: wrap((text) => kleur.blue(text)),
    command: wrap((text) => kleur.bold().blue(text)),
    option: wrap((text) => kleur.cyan(text)),
    argument: wrap((text) => kleur.magenta(text)),
    description: wrap((text) => kleur.white(text)),
    muted: wrap((text) => kleur.gray(text)),
    accent: wrap((text) => kleur.cyan(text)),
  };

  program.configureHelp({
    styleTitle(title) {
      return colors.section(title);
    },
    styleDescriptionText(text) {
      return colors.description(text);
    },
    styleCommandText(text) {
      return colors.command(text);
    },
    styleSubcommandText(text) {
      return colors.command(text);
    },
    styleOptionText(text) {
      return colors.option(text);
    },
    styleArgumentText(text) {
      return colors.argument(text);
    },
  });

  program.addHelpText('beforeAll', () => renderHelpBanner(version, colors));
  program.addHelpText('after', () => renderHelpFooter(program, colors));
}

function renderHelpBanner(version: string, colors: HelpColors): string {
  const subtitle = 'speak or type prompts into Grok, record the replies.';
  return `${colors.banner(`grok-voice-bench v${version}`)} ${colors.subtitle(`- ${subtitle}`)}\n`;
}

function renderHelpFooter(program: Command, colors: HelpColors): string {
  const tips = [
    `${colors.bullet('•')} Start Chrome yourself with ${colors.accent('--remote-debugging-port=9222')} and log into grok.com first; this tool only attaches.`,
    `${colors.bullet('•')} Voice input plays synthesized speech on the default output device. Route it into a virtual microphone, or pass ${colors.accent('--text-only')}.`,
    `${colors.bullet('•')} Every reply is appended to the results CSV as soon as it is captured. After an interruption, rerun with ${colors.accent('--resume')}.`,
    `${colors.bullet('•')} Selectors stop matching when the site changes. Run ${colors.accent(`${program.name()} discover`)} and copy working patterns into ${colors.accent('role_patterns')} in config.json.`,
  ].join('\n');

  const formatExample = (command: string, description: string): string =>
    `${colors.command(`  ${command}`)}\n${colors.muted(`    ${description}`)}`;

  const examples = [
    formatExample(`${program.name()} -i prompts.csv`, 'Run every prompt into a timestamped results file.'),
    formatExample(
      `${program.name()} -i prompts.csv -o results.csv --resume`,
      'Skip ids already recorded in results.csv and append the rest.',
    ),
    formatExample(`${program.name()} discover`, 'Save a JSON report of the patterns that match on the current page.'),
    formatExample(`${program.name()} say "Testing one two three"`, 'Check TTS and audio routing without touching the browser.'),
  ].join('\n\n');

  return `
${colors.section('Tips')}
${tips}

${colors.section('Examples')}
${examples}
`;
}
