// Blog post templates: a system prompt that sets the voice and a block of
// structure guidance appended to the user prompt.

export const TEMPLATE_NAMES = ['how_to', 'tips_list', 'scenario_guide', 'comparison', 'success_story'] as const;
export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export interface BlogTemplate {
  name: TemplateName;
  displayName: string;
  description: string;
  systemPrompt: string;
  structureGuidance: string;
}

export type TemplateSummary = Pick<BlogTemplate, 'name' | 'displayName' | 'description'>;

const MARKDOWN_RULES = `Format in markdown:
- ## for main sections, ### for subsections
- **bold** for key terms
- bullet points for short lists`;

const TEMPLATES: Record<TemplateName, BlogTemplate> = {
  how_to: {
    name: 'how_to',
    displayName: 'How-To Guide',
    description: 'Step-by-step guide teaching a skill or process',
    systemPrompt: `You write practical how-to guides that a first-timer can follow without getting stuck.

Voice:
- Encouraging, like a colleague walking someone through it
- Grounded in real situations rather than theory
- Every step is something the reader can actually do

${MARKDOWN_RULES}
- numbered lists for sequential steps
- > blockquotes for reminders worth remembering`,
    structureGuidance: `Structure the guide as:
1. A short introduction on why the skill is worth learning
2. Anything the reader needs before starting
3. Five to eight numbered steps
4. Mistakes people commonly make
5. A closing section with a clear next step`,
  },

  tips_list: {
    name: 'tips_list',
    displayName: 'Tips & Strategies',
    description: 'Actionable tips and strategies for a topic',
    systemPrompt: `You share tips that work in practice, not filler advice.

Voice:
- Scannable and direct
- Each tip earns its place with a concrete payoff
- Examples or sample wording where they help

${MARKDOWN_RULES}
- each tip as a numbered ## heading, e.g. "## 1. Lead With the Outcome"
- > blockquotes for sample messages or scripts`,
    structureGuidance: `Structure the article as:
1. A two or three sentence hook
2. Seven to ten numbered tips, each with a benefit-led heading, a few paragraphs of explanation and one concrete example
3. A short recap of the key takeaways`,
  },

  scenario_guide: {
    name: 'scenario_guide',
    displayName: 'Scenario Guide',
    description: 'Guidance for specific situations with practical examples',
    systemPrompt: `You are a mentor helping readers handle specific, sometimes awkward, professional situations.

Voice:
- Empathetic about how the situation feels
- Specific to each scenario rather than general
- Sample scripts and conversation openers the reader can adapt

${MARKDOWN_RULES}
- one ## section per scenario
- > blockquotes for example scripts`,
    structureGuidance: `Structure the guide as:
1. An introduction naming the situations covered
2. Four to six scenarios, each with the context, what to do, an example script and what to avoid
3. General principles that apply across all of them
4. A confident closing note`,
  },

  comparison: {
    name: 'comparison',
    displayName: 'Comparison Guide',
    description: 'Compare tools, approaches, or strategies to help readers choose',
    systemPrompt: `You write balanced comparisons that help readers decide, not sales pitches.

Voice:
- Fair to every option, including its weaknesses
- Decision-oriented: who each option suits
- Specific about cost, effort and trade-offs

${MARKDOWN_RULES}
- a markdown table for side-by-side comparison
- ### headings for each option`,
    structureGuidance: `Structure the comparison as:
1. An introduction framing the decision
2. A summary comparison table
3. One section per option with strengths, weaknesses and best fit
4. Questions readers should ask themselves before choosing
5. A recommendation by reader situation`,
  },

  success_story: {
    name: 'success_story',
    displayName: 'Success Story',
    description: 'Inspiring story with practical lessons',
    systemPrompt: `You tell short success stories that leave readers with lessons they can apply.

Voice:
- Narrative and vivid, but brief
- Honest about setbacks along the way
- Lessons stated plainly at the end of each beat

${MARKDOWN_RULES}
- ## headings for each stage of the story
- > blockquotes for memorable quotes`,
    structureGuidance: `Structure the story as:
1. The starting point and the challenge
2. The turning point and what changed
3. The results, with specifics where plausible
4. Three to five lessons the reader can apply
5. A closing that invites the reader to take the first step`,
  },
};

export function listTemplates(): TemplateSummary[] {
  return TEMPLATE_NAMES.map((name) => {
    const { displayName, description } = TEMPLATES[name];
    return { name, displayName, description };
  });
}

export function isTemplateName(name: string): name is TemplateName {
  return TEMPLATE_NAMES.some((candidate) => candidate === name);
}

export function getTemplate(name: string): BlogTemplate | null {
  return isTemplateName(name) ? TEMPLATES[name] : null;
}

export function templateNames(): TemplateName[] {
  return [...TEMPLATE_NAMES];
}

/** `[displayName, name]` pairs for select inputs. */
export function templateOptions(): Array<[string, TemplateName]> {
  return TEMPLATE_NAMES.map((name) => [TEMPLATES[name].displayName, name]);
}
