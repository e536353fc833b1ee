import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { PipelineError } from './errors';
import { formatLocation, type ObjectLocation, type ObjectStore } from './object-store';

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client = new S3Client({})) {}

  async getText(location: ObjectLocation): Promise<string> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: location.bucket, Key: location.key }),
    );

    if (!response.Body) {
      throw new PipelineError(`Object ${formatLocation(location)} has no body`, 'EMPTY_OBJECT');
    }

    return response.Body.transformToString('utf-8');
  }

  async putText(location: ObjectLocation, body: string, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: location.bucket,
        Key: location.key,
        Body: body,
        ContentType: contentType,
      }),
    );
  }
}
