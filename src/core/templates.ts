export const TEMPLATE_NAMES = {
  headerMarkdown: 'HEADER.md',
  headerCode: 'header.py',
  authoringIntro: 'AUTHORING_INTRO.md',
  tableHeader: 'TABLE_EXPECTATIONS_HEADER.md',
  tableNotFound: 'TABLE_EXPECTATIONS_NOT_FOUND.md',
  tableExpectation: 'table_expectation.py',
  columnHeader: 'COLUMN_EXPECTATIONS_HEADER.md',
  columnNotFound: 'COLUMN_EXPECTATIONS_NOT_FOUND.md',
  columnSection: 'COLUMN_EXPECTATIONS.md',
  columnExpectation: 'column_expectation.py',
  footerMarkdown: 'FOOTER.md',
  footerCode: 'footer.py'
} as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[keyof typeof TEMPLATE_NAMES];

const block = (...rows: string[]): string => rows.join('\n');

export const defaultTemplates: Record<TemplateName, string> = {
  'HEADER.md': block(
    '# Edit Your Expectation Suite',
    'Use this notebook to recreate and modify your expectation suite:',
    '',
    '**Expectation Suite Name**: `{{ suite_name }}`'
  ),
  'header.py': block(
    'import datetime',
    'import great_expectations as ge',
    'import great_expectations.jupyter_ux',
    'from great_expectations.data_context.types.resource_identifiers import ValidationResultIdentifier',
    '',
    'context = ge.data_context.DataContext()',
    '',
    '# Feel free to change the name of your suite here. Renaming this will not',
    '# remove the other one.',
    'expectation_suite_name = "{{ suite_name }}"',
    'suite = context.get_expectation_suite(expectation_suite_name)',
    'suite.expectations = []',
    '',
    'batch_kwargs = {{ batch_kwargs }}',
    'batch = context.get_batch(batch_kwargs, suite)',
    'batch.head()',
    ''
  ),
  'AUTHORING_INTRO.md': block(
    '## Create & Edit Expectations',
    '',
    'Add expectations by calling specific expectation methods on the `batch` object.',
    'They all begin with `.expect_` which makes autocompleting easy using tab.'
  ),
  'TABLE_EXPECTATIONS_HEADER.md': '### Table Expectation(s)',
  'TABLE_EXPECTATIONS_NOT_FOUND.md': block(
    'No table level expectations are in this suite. Feel free to add some here.',
    '',
    'They all begin with `batch.expect_table_...`.'
  ),
  'table_expectation.py': 'batch.{{ expectation.expectation_type }}({{ kwargs_string }}{{ meta_args }})\n',
  'COLUMN_EXPECTATIONS_HEADER.md': '### Column Expectation(s)',
  'COLUMN_EXPECTATIONS_NOT_FOUND.md': block(
    'No column level expectations are in this suite. Feel free to add some here.',
    '',
    'They all begin with `batch.expect_column_...`.'
  ),
  'COLUMN_EXPECTATIONS.md': '#### `{{ column }}`',
  'column_expectation.py': 'batch.{{ expectation.expectation_type }}({{ kwargs_string }}{{ meta_args }})\n',
  'FOOTER.md': block(
    '## Save & Review Your Expectations',
    '',
    "Let's save the expectation suite as a JSON file in the `great_expectations/expectations` directory of your project.",
    'If you decide not to save some expectations that you created, remove them with `batch.remove_expectation(...)`.',
    '',
    "Let's now rebuild your Data Docs, which helps you communicate about your data with both machines and humans."
  ),
  'footer.py': block(
    'batch.save_expectation_suite(discard_failed_expectations=False)',
    '',
    'run_id = {',
    '    "run_name": "some_string_that_uniquely_identifies_this_run",',
    '    "run_time": datetime.datetime.now(datetime.timezone.utc),',
    '}',
    'results = context.run_validation_operator("action_list_operator", assets_to_validate=[batch], run_id=run_id)',
    'validation_result_identifier = results.list_validation_result_identifiers()[0]',
    'context.build_data_docs()',
    'context.open_data_docs(validation_result_identifier)'
  )
};
