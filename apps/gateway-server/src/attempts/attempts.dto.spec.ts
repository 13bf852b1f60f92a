import { BadRequestException } from '@nestjs/common';
import { ErrorType } from '@skillcoach/shared-types';
import { createValidationPipe } from '../common/app-setup';
import {
  CompleteAttemptDto,
  RecordErrorDto,
  RecordInputDto,
  StepTelemetryDto,
} from './attempts.dto';

const pipe = createValidationPipe();

function validate(metatype: new () => object, value: unknown): Promise<unknown> {
  return pipe.transform(value, { type: 'body', metatype });
}

async function rejectionMessages(pending: Promise<unknown>): Promise<string[]> {
  try {
    await pending;
  } catch (error) {
    if (error instanceof BadRequestException) {
      const response = error.getResponse();
      if (typeof response === 'object' && 'message' in response && Array.isArray(response.message)) {
        return response.message.map(String);
      }
    }
    throw error;
  }
  throw new Error('expected the payload to be rejected');
}

describe('attempt DTOs', () => {
  it('keeps a valid input as sent', async () => {
    const dto = await validate(RecordInputDto, {
      step_number: 2,
      expected_input: 'W',
      actual_input: 'S',
    });

    expect(dto).toBeInstanceOf(RecordInputDto);
    expect(dto).toEqual({ step_number: 2, expected_input: 'W', actual_input: 'S' });
  });

  it('rejects step numbers that are not JSON integers', async () => {
    for (const stepNumber of [true, '2']) {
      const messages = await rejectionMessages(
        validate(RecordInputDto, { step_number: stepNumber, expected_input: 'W', actual_input: 'W' }),
      );
      expect([...messages].sort()).toEqual([
        'step_number must be an integer number',
        'step_number must not be less than 1',
      ]);
    }

    const messages = await rejectionMessages(
      validate(RecordErrorDto, {
        step_number: true,
        error_type: ErrorType.TIMEOUT,
        expected_action: 'brake',
        actual_action: '',
      }),
    );
    expect(messages).toContain('step_number must be an integer number');
  });

  it('rejects step numbers below one', async () => {
    const messages = await rejectionMessages(
      validate(RecordInputDto, { step_number: 0, expected_input: 'W', actual_input: 'W' }),
    );
    expect(messages).toEqual(['step_number must not be less than 1']);
  });

  it('rejects unknown properties', async () => {
    const messages = await rejectionMessages(
      validate(CompleteAttemptDto, { success: true, score: 10 }),
    );
    expect(messages).toEqual(['property score should not exist']);
  });

  it('requires success on completion', async () => {
    const messages = await rejectionMessages(validate(CompleteAttemptDto, {}));
    expect(messages).toEqual(['success must be a boolean value']);
  });

  it('rejects string and numeric spellings of the completion flag', async () => {
    for (const success of ['false', '0', 'true', 0]) {
      const messages = await rejectionMessages(validate(CompleteAttemptDto, { success }));
      expect(messages).toEqual(['success must be a boolean value']);
    }
    await expect(validate(CompleteAttemptDto, { success: false })).resolves.toEqual({
      success: false,
    });
  });

  it('rejects non-boolean telemetry flags', async () => {
    const messages = await rejectionMessages(
      validate(StepTelemetryDto, { stepNumber: 1, success: 'false', assist_used: 'yes' }),
    );
    expect([...messages].sort()).toEqual([
      'assist_used must be a boolean value',
      'success must be a boolean value',
    ]);
  });

  it('accepts only known error types', async () => {
    const valid = {
      step_number: 1,
      error_type: ErrorType.WRONG_DIRECTION,
      expected_action: 'move_forward',
      actual_action: 'move_backward',
    };
    await expect(validate(RecordErrorDto, valid)).resolves.toEqual(valid);

    const messages = await rejectionMessages(
      validate(RecordErrorDto, { ...valid, error_type: 'fell_over' }),
    );
    expect(messages).toHaveLength(1);
    expect(messages[0]).toMatch(/^error_type must be one of the following values: wrong_input, /);
  });

  it('accepts telemetry in either key spelling', async () => {
    await expect(
      validate(StepTelemetryDto, { stepNumber: 3, holdDuration: 1.5, assistUsed: true }),
    ).resolves.toEqual({ stepNumber: 3, holdDuration: 1.5, assistUsed: true });

    await expect(
      validate(StepTelemetryDto, { step_number: 3, peak_force: 12 }),
    ).resolves.toEqual({ step_number: 3, peak_force: 12 });
  });

  it('rejects negative telemetry measurements', async () => {
    const messages = await rejectionMessages(
      validate(StepTelemetryDto, { stepNumber: 1, distance: -1 }),
    );
    expect(messages).toEqual(['distance must not be less than 0']);
  });
});
