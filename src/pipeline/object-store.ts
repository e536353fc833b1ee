export interface ObjectLocation {
  readonly bucket: string;
  readonly key: string;
}

export interface ObjectStore {
  getText(location: ObjectLocation): Promise<string>;
  putText(location: ObjectLocation, body: string, contentType: string): Promise<void>;
}

export const formatLocation = ({ bucket, key }: ObjectLocation): string => `s3://${bucket}/${key}`;
