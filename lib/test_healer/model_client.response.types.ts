export interface HealingActionResponse {
  //The exact block of the current test file to replace, copied verbatim including indentation. Must be one contiguous block. Use an empty string when no test change can fix the failure
  original_code: string;

  //The complete replacement for original_code
  fixed_code: string;

  //One sentence describing the change
  description: string;
}

export interface DiagnosisResponse {
  //One of LOCATOR_DRIFT, TIMEOUT, ASSERTION_FAILED, ENVIRONMENT_ISSUE, POTENTIAL_APP_DEFECT
  failure_type: "LOCATOR_DRIFT" | "TIMEOUT" | "ASSERTION_FAILED" | "ENVIRONMENT_ISSUE" | "POTENTIAL_APP_DEFECT";

  //A short summary of why the test failed
  failure_summary: string;

  //Your hypothesis about the root cause
  hypothesis: string;

  //Confidence in the diagnosis scaled from 0 to 1
  confidence_score: number;

  //The ordered steps of reasoning that led to the diagnosis
  reasoning_steps: string[];

  //The minimal code change that repairs the test
  action_taken: HealingActionResponse;
}
